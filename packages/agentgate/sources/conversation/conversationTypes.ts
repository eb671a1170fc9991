export type ConversationLogEntry = {
    speaker: string;
    text: string;
    repliedTo?: string;
};
