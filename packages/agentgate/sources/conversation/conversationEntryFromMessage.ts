import type { ConversationLogEntry, GatewayMessage } from "@/types";
import { gatewayMessageText } from "../gateway/gatewayMessageText.js";
import { gatewayUserLabel } from "../gateway/gatewayUserLabel.js";

export const CONVERSATION_NON_TEXT = "[non-text message]";

/**
 * Converts an inbound message into a log entry.
 * Expects: messages without text or caption are kept with a placeholder so the log shows them.
 */
export function conversationEntryFromMessage(message: GatewayMessage): ConversationLogEntry {
    const entry: ConversationLogEntry = {
        speaker: gatewayUserLabel(message.sender),
        text: gatewayMessageText(message) || CONVERSATION_NON_TEXT
    };
    if (message.replyTo?.sender) {
        entry.repliedTo = gatewayUserLabel(message.replyTo.sender);
    }
    return entry;
}
