import type { GatewayMessage, GatewayUser } from "@/types";

/**
 * Checks whether a text message addresses the bot by @handle, by a text mention, or by replying to it.
 */
export function gatewayMentionDetect(message: GatewayMessage, bot: GatewayUser): boolean {
    const text = message.text;
    if (!text) {
        return false;
    }
    const handle = bot.handle?.toLowerCase();
    for (const entity of message.entities) {
        if (entity.kind === "mention" && handle) {
            const mention = text.slice(entity.offset, entity.offset + entity.length);
            if (mention.replace(/^@+/, "").toLowerCase() === handle) {
                return true;
            }
        }
        if (entity.kind === "text_mention" && entity.mentionedUserId === bot.id) {
            return true;
        }
    }
    const repliedTo = message.replyTo?.sender;
    return repliedTo !== undefined && repliedTo.isBot && repliedTo.id === bot.id;
}
