import { promises as fs } from "node:fs";
import path from "node:path";

import TelegramBot from "node-telegram-bot-api";

import type { ChatPlatform, GatewayMessageHandler, GatewayUser, SendTextOptions } from "@/types";
import { ReplyFormatRejectedError } from "../gateway/gatewayErrors.js";
import { getLogger } from "../log.js";
import { telegramConflictErrorIs, telegramParseErrorIs } from "./telegramErrors.js";
import { telegramMessageConvert } from "./telegramMessageConvert.js";

const logger = getLogger("connector.telegram");

export type TelegramConnectorOptions = {
    token: string;
};

/**
 * Long-polling Telegram transport for the gateway.
 * Expects: onMessage is wired before start(); shutdown() is safe to call more than once.
 */
export class TelegramConnector implements ChatPlatform {
    private readonly bot: TelegramBot;
    private readonly handlers: GatewayMessageHandler[] = [];
    private shuttingDown = false;
    private clearedWebhook = false;

    constructor(options: TelegramConnectorOptions) {
        this.bot = new TelegramBot(options.token, { polling: false });

        this.bot.on("message", (message) => {
            void this.dispatch(message);
        });

        this.bot.on("polling_error", (error) => {
            if (this.shuttingDown) {
                return;
            }
            this.handlePollingError(error);
        });
    }

    onMessage(handler: GatewayMessageHandler): () => void {
        this.handlers.push(handler);
        return () => {
            const index = this.handlers.indexOf(handler);
            if (index !== -1) {
                this.handlers.splice(index, 1);
            }
        };
    }

    async start(): Promise<void> {
        await this.ensureWebhookCleared();
        logger.debug("start: Starting Telegram polling");
        await this.bot.startPolling({ restart: true, polling: { autoStart: true, params: {} } });
        logger.info("start: Telegram polling started");
    }

    async shutdown(reason: string = "shutdown"): Promise<void> {
        if (this.shuttingDown) {
            logger.debug("event: Already shutting down, returning");
            return;
        }
        this.shuttingDown = true;
        try {
            logger.debug("stop: Stopping polling");
            await this.bot.stopPolling({ cancel: true, reason });
            logger.debug("stop: Polling stopped");
        } catch (error) {
            logger.warn({ error }, "error: Telegram polling stop failed");
        }
    }

    async identity(): Promise<GatewayUser> {
        const me = await this.bot.getMe();
        const user: GatewayUser = { id: me.id, isBot: me.is_bot };
        if (me.username) {
            user.handle = me.username;
        }
        if (me.first_name) {
            user.firstName = me.first_name;
        }
        return user;
    }

    async sendText(conversationId: number, text: string, options: SendTextOptions): Promise<void> {
        const markdown = options.format === "markdown";
        const sendOptions: TelegramBot.SendMessageOptions = {
            disable_web_page_preview: options.disableLinkPreview
        };
        if (markdown) {
            sendOptions.parse_mode = "Markdown";
        }
        try {
            await this.bot.sendMessage(conversationId, text, sendOptions);
        } catch (error) {
            if (markdown && telegramParseErrorIs(error)) {
                logger.debug({ conversationId }, "event: Telegram rejected Markdown reply");
                throw new ReplyFormatRejectedError("Telegram could not parse the Markdown reply", { cause: error });
            }
            throw error;
        }
    }

    async sendTyping(conversationId: number): Promise<void> {
        await this.bot.sendChatAction(conversationId, "typing");
    }

    async downloadDocument(fileId: string, destination: string): Promise<void> {
        const staging = await fs.mkdtemp(path.join(path.dirname(destination), ".download-"));
        try {
            const downloaded = await this.bot.downloadFile(fileId, staging);
            await fs.rename(downloaded, destination);
        } finally {
            await fs.rm(staging, { recursive: true, force: true });
        }
    }

    private async dispatch(message: TelegramBot.Message): Promise<void> {
        const converted = telegramMessageConvert(message);
        for (const handler of this.handlers) {
            try {
                await handler(converted);
            } catch (error) {
                logger.warn({ error, conversationId: converted.conversationId }, "error: Message handler failed");
            }
        }
    }

    private handlePollingError(error: unknown): void {
        if (telegramConflictErrorIs(error) && !this.clearedWebhook) {
            logger.warn({ error }, "event: Telegram polling conflict; clearing webhook");
            void this.ensureWebhookCleared();
            return;
        }
        logger.warn({ error }, "error: Telegram polling error; relying on library restart");
    }

    private async ensureWebhookCleared(): Promise<void> {
        if (this.clearedWebhook) {
            return;
        }
        try {
            await this.bot.deleteWebHook();
            this.clearedWebhook = true;
            logger.info("event: Telegram webhook cleared for polling");
        } catch (error) {
            logger.warn({ error }, "error: Failed to clear Telegram webhook");
        }
    }
}
