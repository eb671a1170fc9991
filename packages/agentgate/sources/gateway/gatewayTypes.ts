export type ConversationType = "private" | "group" | "supergroup" | "channel";

export type GatewayUser = {
    id: number;
    isBot: boolean;
    handle?: string;
    firstName?: string;
    lastName?: string;
};

export type GatewayEntityKind = "mention" | "text_mention" | "other";

export type GatewayEntity = {
    kind: GatewayEntityKind;
    offset: number;
    length: number;
    mentionedUserId?: number;
};

export type GatewayDocument = {
    fileId: string;
    fileUniqueId: string;
    fileName?: string;
    fileSize?: number;
};

export type GatewayMessage = {
    conversationId: number;
    conversationType: ConversationType;
    conversationHandle?: string;
    messageId: number;
    sender?: GatewayUser;
    text: string | null;
    caption: string | null;
    entities: GatewayEntity[];
    replyTo?: {
        sender?: GatewayUser;
    };
    document?: GatewayDocument;
};

export type ReplyFormat = "markdown" | "plain";

export type SendTextOptions = {
    format: ReplyFormat;
    disableLinkPreview: boolean;
};

/**
 * Chat transport used by the gateway.
 * Expects: sendText rejects with ReplyFormatRejectedError when the platform refuses markdown.
 */
export type ChatPlatform = {
    identity(): Promise<GatewayUser>;
    sendText(conversationId: number, text: string, options: SendTextOptions): Promise<void>;
    sendTyping(conversationId: number): Promise<void>;
    downloadDocument(fileId: string, destination: string): Promise<void>;
};

export type GatewayMessageHandler = (message: GatewayMessage) => void | Promise<void>;
