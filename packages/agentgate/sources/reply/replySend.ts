import type { ChatPlatform, ReplyFormat } from "@/types";
import { replySplit } from "./replySplit.js";

export const REPLY_PLAIN_LIMIT = 3900;
export const REPLY_MARKDOWN_LIMIT = 3500;

export type ReplySendOptions = {
    formatted?: boolean;
};

/**
 * Sends text as one or more chat messages with link previews disabled.
 * Expects: formatted text is sent as markdown only when it fits one markdown message; longer text goes out plain.
 * Returns the number of messages sent.
 */
export async function replySend(
    platform: ChatPlatform,
    conversationId: number,
    text: string,
    options: ReplySendOptions = {}
): Promise<number> {
    if (!text) {
        return 0;
    }
    const markdown = options.formatted === true && text.length <= REPLY_MARKDOWN_LIMIT;
    const format: ReplyFormat = markdown ? "markdown" : "plain";
    const chunks = replySplit(text, markdown ? REPLY_MARKDOWN_LIMIT : REPLY_PLAIN_LIMIT);
    for (const chunk of chunks) {
        await platform.sendText(conversationId, chunk, { format, disableLinkPreview: true });
    }
    return chunks.length;
}
