import { promises as fs } from "node:fs";
import path from "node:path";

import type { ChatPlatform, GatewayDocument, GatewayMessage, GatewayUser, Sandbox } from "@/types";
import type { AgentInvoker } from "../agent/agentInvoker.js";
import { AgentEmptyResponseError } from "../agent/agentErrors.js";
import type { AgentSessionStore } from "../agent/agentSessionStore.js";
import { archiveExtract } from "../archive/archiveExtract.js";
import { conversationEntryFromMessage } from "../conversation/conversationEntryFromMessage.js";
import type { ConversationLog } from "../conversation/conversationLog.js";
import { getLogger } from "../log.js";
import { replySend } from "../reply/replySend.js";
import type { SandboxManager } from "../sandbox/sandboxManager.js";
import { sandboxPromptBuild } from "../sandbox/sandboxPromptBuild.js";
import { filenameSanitize } from "../util/filenameSanitize.js";
import { KeyedLock } from "../util/keyedLock.js";
import { pathRealIsWithin } from "../util/pathRealResolveExisting.js";
import type { GatewayAccess } from "./gatewayAccess.js";
import { ReplyFormatRejectedError, UploadError } from "./gatewayErrors.js";
import { gatewayHelpCommandParse } from "./gatewayHelpCommandParse.js";
import { gatewayMentionDetect } from "./gatewayMentionDetect.js";
import { gatewayMessageText } from "./gatewayMessageText.js";
import { GATEWAY_TEXT, gatewayErrorText, gatewayFileSavedText } from "./gatewayTexts.js";
import { typingLoopStart, TYPING_INTERVAL_MS } from "./typingLoopStart.js";

const logger = getLogger("gateway");

export type GatewayOptions = {
    platform: ChatPlatform;
    invoker: Pick<AgentInvoker, "invoke">;
    access: GatewayAccess;
    conversationLog: ConversationLog;
    sessions: AgentSessionStore;
    sandboxes: SandboxManager;
    agentWorkdir: string;
    maxUploadBytes: number;
    typingIntervalMs?: number;
};

type StoredUpload = {
    sandbox: Sandbox;
    filename: string;
    extracted: number;
};

/**
 * Routes chat messages to the agent and replies with its answers.
 * Expects: handleMessage never rejects; every failure ends as one chat reply or a log line.
 */
export class Gateway {
    private readonly options: GatewayOptions;
    private readonly bindingLock = new KeyedLock<number>();
    private botIdentity: Promise<GatewayUser> | null = null;

    constructor(options: GatewayOptions) {
        this.options = options;
    }

    async handleMessage(message: GatewayMessage): Promise<void> {
        try {
            this.capture(message);
            if (await this.helpCommandIs(message)) {
                await this.handleHelp(message);
                return;
            }
            if (message.document) {
                await this.handleDocument(message, message.document);
                return;
            }
            await this.handleTrigger(message);
        } catch (error) {
            logger.error({ error, conversationId: message.conversationId }, "error: Message handling failed");
        }
    }

    private capture(message: GatewayMessage): void {
        if (!this.options.access.admit(message)) {
            logger.debug({ conversationId: message.conversationId }, "skip: Conversation not authorized for logging");
            return;
        }
        this.options.conversationLog.append(message.conversationId, conversationEntryFromMessage(message));
    }

    private async handleHelp(message: GatewayMessage): Promise<void> {
        const text = this.options.access.senderIsAllowed(message) ? GATEWAY_TEXT.help : GATEWAY_TEXT.accessDenied;
        await replySend(this.options.platform, message.conversationId, text);
    }

    private async handleTrigger(message: GatewayMessage): Promise<void> {
        const conversationId = message.conversationId;
        if (message.sender?.isBot) {
            return;
        }
        const isPrivate = message.conversationType === "private";
        if (!isPrivate && !gatewayMentionDetect(message, await this.identity())) {
            return;
        }
        if (!this.options.access.admit(message)) {
            logger.info({ conversationId, senderId: message.sender?.id }, "skip: Access denied");
            await replySend(this.options.platform, conversationId, GATEWAY_TEXT.accessDenied);
            return;
        }

        await this.agentReply(conversationId, () => this.triggerPromptBuild(message, isPrivate));
    }

    private async triggerPromptBuild(message: GatewayMessage, isPrivate: boolean): Promise<string> {
        const conversationId = message.conversationId;
        const requestText = gatewayMessageText(message);
        const prompt = isPrivate ? requestText : this.options.conversationLog.render(conversationId);
        const sandbox = this.options.sandboxes.get(conversationId);
        if (!sandbox) {
            return prompt;
        }
        const block = await sandboxPromptBuild(sandbox, requestText);
        return block ? `${prompt}\n\n${block}` : prompt;
    }

    private async handleDocument(message: GatewayMessage, document: GatewayDocument): Promise<void> {
        const conversationId = message.conversationId;
        const requestText = gatewayMessageText(message).trim() || GATEWAY_TEXT.documentDefaultRequest;
        if (!this.options.access.admit(message)) {
            await replySend(this.options.platform, conversationId, GATEWAY_TEXT.accessDenied);
            return;
        }

        let upload: StoredUpload;
        let uploadedFile: string;
        let block: string;
        try {
            upload = await this.uploadStore(conversationId, document);
            uploadedFile = path.join(upload.sandbox.exposedLink, upload.filename);
            block = await sandboxPromptBuild(upload.sandbox, requestText, uploadedFile);
        } catch (error) {
            await replySend(this.options.platform, conversationId, this.uploadFailureText(conversationId, error));
            return;
        }

        if (!block) {
            await replySend(this.options.platform, conversationId, gatewayFileSavedText(uploadedFile, upload.extracted));
            return;
        }
        await this.agentReply(conversationId, async () => block);
    }

    private uploadFailureText(conversationId: number, error: unknown): string {
        if (!(error instanceof UploadError)) {
            logger.error({ error, conversationId }, "error: Upload handling failed");
            return gatewayErrorText(error);
        }
        logger.warn({ error, conversationId, kind: error.kind }, "error: Upload rejected");
        switch (error.kind) {
            case "too_large":
                return GATEWAY_TEXT.fileTooLarge;
            case "download":
                return GATEWAY_TEXT.downloadFailed;
            case "extract":
                return GATEWAY_TEXT.processFailed;
        }
    }

    /**
     * Downloads a document into the conversation sandbox and unpacks it into work/.
     * Expects: files that are not archives are copied into work/ unchanged.
     */
    private async uploadStore(conversationId: number, document: GatewayDocument): Promise<StoredUpload> {
        if (document.fileSize !== undefined && document.fileSize > this.options.maxUploadBytes) {
            throw new UploadError("too_large", `Document is ${document.fileSize} bytes`);
        }
        const sandbox = await this.options.sandboxes.ensure(conversationId);
        const filename = filenameSanitize(document.fileName ?? document.fileUniqueId);

        try {
            const destination = sandboxTargetResolve(sandbox.uploadsPath, filename);
            await this.options.platform.downloadDocument(document.fileId, destination);
        } catch (error) {
            throw new UploadError("download", `Failed to download ${filename}`, { cause: error });
        }

        try {
            const destination = path.join(sandbox.uploadsPath, filename);
            const extracted = await archiveExtract(destination, sandbox.workPath);
            if (extracted === 0) {
                await fs.copyFile(destination, sandboxTargetResolve(sandbox.workPath, filename));
            }
            logger.info({ conversationId, sandboxId: sandbox.id, filename, extracted }, "event: Upload stored");
            return { sandbox, filename, extracted };
        } catch (error) {
            throw new UploadError("extract", `Failed to process ${filename}`, { cause: error });
        }
    }

    /**
     * Builds the prompt, runs the agent and sends its answer.
     * Expects: every failure after the trigger was accepted, prompt building included, ends as one chat reply.
     */
    private async agentReply(conversationId: number, promptBuild: () => Promise<string>): Promise<void> {
        const { platform, invoker, sessions, agentWorkdir } = this.options;
        const typing = typingLoopStart(
            () => platform.sendTyping(conversationId),
            this.options.typingIntervalMs ?? TYPING_INTERVAL_MS
        );
        const startedAt = Date.now();
        let answer = "";

        try {
            const prompt = await promptBuild();
            const result = await invoker.invoke(prompt, agentWorkdir, sessions.get(conversationId));
            await this.sessionRecord(conversationId, result.sessionId);
            if (!result.answerText) {
                throw new AgentEmptyResponseError();
            }
            answer = result.answerText;
            await replySend(platform, conversationId, answer, { formatted: true });
            logger.info({ conversationId, elapsedMs: Date.now() - startedAt }, "event: Agent reply sent");
        } catch (error) {
            if (error instanceof ReplyFormatRejectedError) {
                logger.warn({ conversationId }, "event: Markdown rejected, resending as plain text");
                await replySend(platform, conversationId, answer || GATEWAY_TEXT.invalidMarkdown);
            } else {
                logger.error({ error, conversationId }, "error: Agent request failed");
                await replySend(platform, conversationId, gatewayErrorText(error));
            }
        } finally {
            await typing.stop();
        }
    }

    /**
     * Stores the session id reported by the agent and rebinds the sandbox when the session changed.
     * Expects: the stored session is read inside the lock, so overlapping runs compare against the latest binding.
     */
    private async sessionRecord(conversationId: number, next: string | undefined): Promise<void> {
        const { sessions, sandboxes } = this.options;
        if (!next) {
            if (!sessions.get(conversationId)) {
                logger.warn({ conversationId }, "skip: Agent reported no session id");
            }
            return;
        }
        await this.bindingLock.inLock(conversationId, async () => {
            const previous = sessions.get(conversationId);
            if (previous && previous !== next) {
                logger.debug({ conversationId, previous, next }, "event: Agent session changed, rebinding sandbox");
                await sandboxes.ensure(conversationId, { sandboxId: next, forceNew: true });
            } else if (!previous && !sandboxes.get(conversationId)) {
                await sandboxes.ensure(conversationId, { sandboxId: next });
            } else if (!previous) {
                logger.debug({ conversationId, next }, "event: First session keeps the upload sandbox");
            }
            sessions.set(conversationId, next);
        });
    }

    private async helpCommandIs(message: GatewayMessage): Promise<boolean> {
        const command = gatewayHelpCommandParse(message.text);
        if (!command) {
            return false;
        }
        if (command.botHandle === null) {
            return true;
        }
        const bot = await this.identity();
        return bot.handle !== undefined && bot.handle.toLowerCase() === command.botHandle.toLowerCase();
    }

    private identity(): Promise<GatewayUser> {
        if (!this.botIdentity) {
            this.botIdentity = this.options.platform.identity().then(
                (user) => {
                    logger.info({ botId: user.id, handle: user.handle }, "event: Bot identity resolved");
                    return user;
                },
                (error: unknown) => {
                    this.botIdentity = null;
                    throw error;
                }
            );
        }
        return this.botIdentity;
    }
}

function sandboxTargetResolve(directory: string, filename: string): string {
    const target = path.join(directory, filename);
    if (!pathRealIsWithin(directory, target)) {
        throw new Error(`Refusing to write ${filename} outside the sandbox`);
    }
    return target;
}
