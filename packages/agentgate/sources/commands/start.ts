import { promises as fs } from "node:fs";

import { AgentInvoker } from "../agent/agentInvoker.js";
import { AgentSessionStore } from "../agent/agentSessionStore.js";
import { configLoad } from "../config/configLoad.js";
import { ConversationLog } from "../conversation/conversationLog.js";
import { Gateway } from "../gateway/gateway.js";
import { GatewayAccess } from "../gateway/gatewayAccess.js";
import { getLogger } from "../log.js";
import { SandboxManager } from "../sandbox/sandboxManager.js";
import { TelegramConnector } from "../telegram/telegramConnector.js";
import { awaitShutdown, onShutdown } from "../util/shutdown.js";

const logger = getLogger("command.start");

export type StartOptions = {
    agentDir?: string;
    env?: string;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const config = await configLoad({ envPath: options.env, agentDir: options.agentDir });
    logger.info({ agentWorkdir: config.agentWorkdir, sandboxRoot: config.sandboxRoot }, "start: Starting agentgate");
    if (config.allowed.unresolved.length > 0) {
        logger.warn({ entries: config.allowed.unresolved }, "skip: Ignoring unresolved ALLOWED_CHAT_USER_IDS entries");
    }

    const preamble = config.agent.preamblePath ? await fs.readFile(config.agent.preamblePath, "utf8") : undefined;
    const invoker = new AgentInvoker({
        command: config.agent.command,
        baseArgs: config.agent.baseArgs,
        model: config.agent.model,
        preamble
    });

    const connector = new TelegramConnector({ token: config.telegramToken });
    const gateway = new Gateway({
        platform: connector,
        invoker,
        access: new GatewayAccess(config.allowed),
        conversationLog: new ConversationLog(),
        sessions: new AgentSessionStore(),
        sandboxes: new SandboxManager({ sandboxRoot: config.sandboxRoot, agentWorkdir: config.agentWorkdir }),
        agentWorkdir: config.agentWorkdir,
        maxUploadBytes: config.maxUploadBytes
    });

    connector.onMessage((message) => gateway.handleMessage(message));
    onShutdown("telegram", () => connector.shutdown("shutdown"));
    await connector.start();

    logger.info("ready: Ready. Listening for messages.");
    const signal = await awaitShutdown();
    logger.info({ signal }, "event: Shutdown complete");
    process.exit(0);
}
