import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "./configError.js";
import { DEFAULT_SANDBOX_ROOT, configLoad } from "./configLoad.js";

describe("configLoad", () => {
    let tempDir: string;
    let envPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "agentgate-config-"));
        envPath = path.join(tempDir, ".env");
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("reads the .env file and applies defaults", async () => {
        await fs.writeFile(envPath, "TELEGRAM_BOT_TOKEN=test-secret\nALLOWED_CHAT_USER_IDS=42,@alice\n");

        const config = await configLoad({ envPath, agentDir: tempDir, env: {} });

        expect(config).toEqual({
            telegramToken: "test-secret",
            allowed: {
                userIds: new Set([42]),
                chatIds: new Set([42]),
                usernames: new Set(["alice"]),
                chatUsernames: new Set(["alice"]),
                unresolved: []
            },
            agent: {
                command: "codex",
                baseArgs: ["--dangerously-bypass-approvals-and-sandbox", "exec"],
                model: undefined,
                preamblePath: undefined
            },
            agentWorkdir: tempDir,
            sandboxRoot: DEFAULT_SANDBOX_ROOT,
            maxUploadBytes: 52428800,
            envPath
        });
    });

    it("prefers variables that are already set", async () => {
        await fs.writeFile(envPath, "TELEGRAM_BOT_TOKEN=file-token\nALLOWED_CHAT_USER_IDS=1\n");

        const config = await configLoad({
            envPath,
            agentDir: tempDir,
            env: {
                TELEGRAM_BOT_TOKEN: "env-token",
                AGENT_COMMAND: "/usr/local/bin/agent",
                AGENT_ARGS: "run  --fast",
                CODEX_MODEL: "model-b",
                AGENTGATE_SANDBOX_ROOT: path.join(tempDir, "sandboxes"),
                AGENTGATE_MAX_UPLOAD_BYTES: "1024"
            }
        });

        expect(config.telegramToken).toBe("env-token");
        expect(config.agent).toEqual({
            command: "/usr/local/bin/agent",
            baseArgs: ["run", "--fast"],
            model: "model-b",
            preamblePath: undefined
        });
        expect(config.sandboxRoot).toBe(path.join(tempDir, "sandboxes"));
        expect(config.maxUploadBytes).toBe(1024);
    });

    it("lets AGENT_MODEL win over CODEX_MODEL", async () => {
        const config = await configLoad({
            envPath,
            agentDir: tempDir,
            env: { TELEGRAM_BOT_TOKEN: "test-secret", ALLOWED_CHAT_USER_IDS: "1", AGENT_MODEL: "a", CODEX_MODEL: "b" }
        });

        expect(config.agent.model).toBe("a");
    });

    it("reports missing required variables", async () => {
        const error = await configLoad({ envPath, agentDir: tempDir, env: { ALLOWED_CHAT_USER_IDS: "1" } }).catch(
            (caught: unknown) => caught
        );

        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toMatchObject({ issues: ["TELEGRAM_BOT_TOKEN is required"] });
    });

    it("rejects an invalid upload cap", async () => {
        await expect(
            configLoad({
                envPath,
                agentDir: tempDir,
                env: { TELEGRAM_BOT_TOKEN: "test-secret", ALLOWED_CHAT_USER_IDS: "1", AGENTGATE_MAX_UPLOAD_BYTES: "-5" }
            })
        ).rejects.toThrow("AGENTGATE_MAX_UPLOAD_BYTES must be a positive integer");
    });

    it("rejects allow-lists without usable entries", async () => {
        await expect(
            configLoad({
                envPath,
                agentDir: tempDir,
                env: { TELEGRAM_BOT_TOKEN: "test-secret", ALLOWED_CHAT_USER_IDS: "t.me/+invite" }
            })
        ).rejects.toThrow("ALLOWED_CHAT_USER_IDS has no usable entries\n- t.me/+invite");
    });

    it("rejects a missing agent directory", async () => {
        const agentDir = path.join(tempDir, "missing");

        await expect(
            configLoad({ envPath, agentDir, env: { TELEGRAM_BOT_TOKEN: "test-secret", ALLOWED_CHAT_USER_IDS: "1" } })
        ).rejects.toThrow(`Agent directory not found: ${agentDir}`);
    });
});
