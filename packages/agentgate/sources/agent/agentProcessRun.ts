import { spawn } from "node:child_process";

import { getLogger } from "../log.js";
import { AgentProcessError } from "./agentErrors.js";
import type { AgentCommand } from "./agentCommandBuild.js";

const logger = getLogger("agent.process");

export type AgentProcessOutput = {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
};

/**
 * Runs the agent to completion, feeding the prompt on stdin and buffering both output streams.
 * Expects: the promise rejects only when the process cannot be started.
 */
export function agentProcessRun(command: AgentCommand, env: NodeJS.ProcessEnv = process.env): Promise<AgentProcessOutput> {
    return new Promise((resolve, reject) => {
        const child = spawn(command.command, command.args, {
            cwd: command.cwd,
            env,
            stdio: ["pipe", "pipe", "pipe"],
            windowsHide: true
        });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];

        child.stdout.on("data", (chunk: Buffer) => {
            stdout.push(chunk);
        });
        child.stderr.on("data", (chunk: Buffer) => {
            stderr.push(chunk);
        });
        child.stdin.on("error", (error) => {
            logger.debug({ error }, "event: Agent closed stdin early");
        });
        child.on("error", (error) => {
            reject(new AgentProcessError(`Failed to start ${command.command}: ${error.message}`, { cause: error }));
        });
        child.on("close", (exitCode, signal) => {
            resolve({
                exitCode,
                signal,
                stdout: Buffer.concat(stdout).toString("utf8"),
                stderr: Buffer.concat(stderr).toString("utf8")
            });
        });

        child.stdin.end(command.input, "utf8");
    });
}
