#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { Command } from "commander";
import { z } from "zod";

import { startCommand } from "./commands/start.js";
import { ConfigError } from "./config/configError.js";
import { getLogger, initLogging } from "./log.js";

const packageSchema = z.object({ version: z.string() });
const pkg = packageSchema.parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

initLogging();
const logger = getLogger("main");

program.name("agentgate").description("Relay Telegram chats to a local coding agent").version(pkg.version);

program
    .command("start")
    .description("Connect to Telegram and relay messages to the agent")
    .option("-a, --agent-dir <path>", "Agent working directory (defaults to the current directory)")
    .option("-e, --env <path>", "Path to the .env file", ".env")
    .action(startCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    if (error instanceof ConfigError) {
        logger.error(`error: ${error.message}`);
    } else {
        logger.error({ error }, "error: Command failed");
    }
    process.exitCode = 1;
});
