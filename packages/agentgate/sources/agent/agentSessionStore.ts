/**
 * In-memory map from conversation id to the agent's resumable session id.
 */
export class AgentSessionStore {
    private readonly sessions = new Map<number, string>();

    get(conversationId: number): string | undefined {
        return this.sessions.get(conversationId);
    }

    set(conversationId: number, sessionId: string): void {
        this.sessions.set(conversationId, sessionId);
    }
}
