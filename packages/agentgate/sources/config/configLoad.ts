import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import dotenv from "dotenv";

import type { Config } from "@/types";
import { fsErrorIsNotFound } from "../util/fsErrorIsNotFound.js";
import { allowedEntriesEmpty, allowedEntriesResolve } from "./allowedEntriesResolve.js";
import { configEnvParse } from "./configEnvParse.js";
import { ConfigError } from "./configError.js";

export const DEFAULT_AGENT_COMMAND = "codex";
export const DEFAULT_AGENT_ARGS = ["--dangerously-bypass-approvals-and-sandbox", "exec"];
export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;
export const DEFAULT_SANDBOX_ROOT = path.join(os.tmpdir(), "agentgate");

export type ConfigLoadOptions = {
    envPath?: string;
    agentDir?: string;
    env?: NodeJS.ProcessEnv;
};

/**
 * Loads, validates, and resolves the gateway configuration.
 * Expects: variables already present in env win over the .env file; a missing .env file is not an error.
 */
export async function configLoad(options: ConfigLoadOptions = {}): Promise<Config> {
    const envPath = path.resolve(options.envPath ?? ".env");
    const fileValues = await envFileRead(envPath);
    const env = configEnvParse({ ...fileValues, ...(options.env ?? process.env) });

    const allowed = allowedEntriesResolve(env.ALLOWED_CHAT_USER_IDS);
    if (allowedEntriesEmpty(allowed)) {
        throw new ConfigError("ALLOWED_CHAT_USER_IDS has no usable entries", allowed.unresolved);
    }

    const agentWorkdir = path.resolve(homeExpand(options.agentDir ?? process.cwd()));
    const stats = await fs.stat(agentWorkdir).catch(() => null);
    if (!stats?.isDirectory()) {
        throw new ConfigError(`Agent directory not found: ${agentWorkdir}`);
    }

    return {
        telegramToken: env.TELEGRAM_BOT_TOKEN,
        allowed,
        agent: {
            command: env.AGENT_COMMAND ?? DEFAULT_AGENT_COMMAND,
            baseArgs: env.AGENT_ARGS ? env.AGENT_ARGS.split(/\s+/) : [...DEFAULT_AGENT_ARGS],
            model: env.AGENT_MODEL ?? env.CODEX_MODEL,
            preamblePath: env.AGENT_PREAMBLE_PATH ? path.resolve(homeExpand(env.AGENT_PREAMBLE_PATH)) : undefined
        },
        agentWorkdir,
        sandboxRoot: env.AGENTGATE_SANDBOX_ROOT
            ? path.resolve(homeExpand(env.AGENTGATE_SANDBOX_ROOT))
            : DEFAULT_SANDBOX_ROOT,
        maxUploadBytes: env.AGENTGATE_MAX_UPLOAD_BYTES ?? DEFAULT_MAX_UPLOAD_BYTES,
        envPath
    };
}

async function envFileRead(envPath: string): Promise<Record<string, string>> {
    try {
        return dotenv.parse(await fs.readFile(envPath));
    } catch (error) {
        if (fsErrorIsNotFound(error)) {
            return {};
        }
        throw error;
    }
}

function homeExpand(value: string): string {
    if (value === "~") {
        return os.homedir();
    }
    if (value.startsWith("~/")) {
        return path.join(os.homedir(), value.slice(2));
    }
    return value;
}
