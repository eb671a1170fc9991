export type { AgentJsonObject, AgentJsonValue } from "./agent/agentJsonValue.js";
export type { ArchiveKind } from "./archive/archiveTypes.js";
export type { AgentConfig, AllowedEntries, Config } from "./config/configTypes.js";
export type { ConversationLogEntry } from "./conversation/conversationTypes.js";
export type {
    ChatPlatform,
    ConversationType,
    GatewayDocument,
    GatewayEntity,
    GatewayEntityKind,
    GatewayMessage,
    GatewayMessageHandler,
    GatewayUser,
    ReplyFormat,
    SendTextOptions
} from "./gateway/gatewayTypes.js";
export type { Sandbox, SandboxEnsureOptions } from "./sandbox/sandboxTypes.js";
