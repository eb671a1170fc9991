import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AgentProcessError } from "./agentErrors.js";
import { AgentInvoker } from "./agentInvoker.js";

describe("AgentInvoker", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "agentgate-invoker-"));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function scriptWrite(body: string): Promise<string> {
        const scriptPath = path.join(tempDir, "agent.sh");
        await fs.writeFile(scriptPath, `#!/bin/sh\n${body}\n`, "utf8");
        await fs.chmod(scriptPath, 0o755);
        return scriptPath;
    }

    it("returns the parsed answer and session id", async () => {
        const command = await scriptWrite(
            [
                "cat > /dev/null",
                `echo '{"session_id":"s1"}'`,
                `echo 'progress line'`,
                `echo '{"type":"assistant_message","text":"Hi there"}'`
            ].join("\n")
        );
        const invoker = new AgentInvoker({ command, baseArgs: [] });

        const result = await invoker.invoke("hello", tempDir);

        expect(result).toEqual({ answerText: "Hi there", sessionId: "s1" });
    });

    it("passes the prompt on stdin and the workdir on the command line", async () => {
        const argsPath = path.join(tempDir, "args.txt");
        const stdinPath = path.join(tempDir, "stdin.txt");
        const command = await scriptWrite(`printf '%s\\n' "$@" > "${argsPath}"\ncat > "${stdinPath}"`);
        const invoker = new AgentInvoker({ command, baseArgs: ["exec"], preamble: "Rules." });

        await invoker.invoke("what failed?", tempDir);

        expect(await fs.readFile(argsPath, "utf8")).toBe(["exec", "--json", "-C", tempDir, "-", ""].join("\n"));
        expect(await fs.readFile(stdinPath, "utf8")).toBe("Rules.\n\nwhat failed?");
    });

    it("keeps the previous session id when the stream declares none", async () => {
        const command = await scriptWrite(`cat > /dev/null\necho '{"type":"final_message","text":"ok"}'`);
        const invoker = new AgentInvoker({ command, baseArgs: [] });

        const result = await invoker.invoke("again", tempDir, "s-old");

        expect(result).toEqual({ answerText: "ok", sessionId: "s-old" });
    });

    it("throws with trimmed stderr on a non-zero exit", async () => {
        const command = await scriptWrite("echo ' boom ' >&2\nexit 2");
        const invoker = new AgentInvoker({ command, baseArgs: [] });

        const error = await invoker.invoke("x", tempDir).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(AgentProcessError);
        expect(error).toMatchObject({ kind: "process", message: "boom", exitCode: 2 });
    });

    it("uses a default message when stderr is empty", async () => {
        const command = await scriptWrite("exit 3");
        const invoker = new AgentInvoker({ command, baseArgs: [] });

        await expect(invoker.invoke("x", tempDir)).rejects.toThrow("agent process failed");
    });

    it("returns the error text instead of throwing when failure is allowed", async () => {
        const command = await scriptWrite("echo boom >&2\nexit 1");
        const invoker = new AgentInvoker({ command, baseArgs: [] });

        const result = await invoker.invoke("x", tempDir, "s1", { allowFailure: true });

        expect(result).toEqual({ sessionId: "s1", errorText: "boom" });
    });

    it("returns no answer for empty output", async () => {
        const command = await scriptWrite("cat > /dev/null");
        const invoker = new AgentInvoker({ command, baseArgs: [] });

        expect(await invoker.invoke("x", tempDir)).toEqual({ answerText: undefined, sessionId: undefined });
    });

    it("reports a start failure when the command does not exist", async () => {
        const invoker = new AgentInvoker({ command: path.join(tempDir, "missing-agent"), baseArgs: [] });

        const error = await invoker.invoke("x", tempDir).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(AgentProcessError);
        expect(error).toMatchObject({ kind: "process", exitCode: null });
        expect(error instanceof Error ? error.message : "").toContain("Failed to start");
    });
});
