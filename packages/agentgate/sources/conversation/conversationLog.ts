import type { ConversationLogEntry } from "@/types";

export const CONVERSATION_LOG_LIMIT = 30;

/**
 * Bounded per-conversation history of observed messages.
 * Expects: entries are kept in arrival order and only the newest `limit` survive.
 */
export class ConversationLog {
    private readonly limit: number;
    private readonly logs = new Map<number, ConversationLogEntry[]>();

    constructor(limit = CONVERSATION_LOG_LIMIT) {
        this.limit = limit;
    }

    append(conversationId: number, entry: ConversationLogEntry): void {
        const entries = this.logs.get(conversationId) ?? [];
        entries.push({ ...entry });
        if (entries.length > this.limit) {
            entries.splice(0, entries.length - this.limit);
        }
        this.logs.set(conversationId, entries);
    }

    entries(conversationId: number): ConversationLogEntry[] {
        return (this.logs.get(conversationId) ?? []).map((entry) => ({ ...entry }));
    }

    render(conversationId: number): string {
        const lines = this.entries(conversationId).map((entry) => {
            const speaker = entry.repliedTo ? `${entry.speaker} (reply to ${entry.repliedTo})` : entry.speaker;
            return `- ${speaker}: ${entry.text}`;
        });
        return `Chat log (last ${this.limit} messages, in send order):\n${lines.join("\n")}`;
    }
}
