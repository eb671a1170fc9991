import type { AllowedEntries, GatewayMessage } from "@/types";

/**
 * Decides who may use the gateway.
 * Expects: a conversation becomes authorized once an allowed sender writes in it, and stays so for the process lifetime.
 */
export class GatewayAccess {
    private readonly allowed: AllowedEntries;
    private readonly authorized: Set<number>;

    constructor(allowed: AllowedEntries) {
        this.allowed = allowed;
        this.authorized = new Set(allowed.chatIds);
    }

    senderIsAllowed(message: GatewayMessage): boolean {
        const sender = message.sender;
        if (!sender) {
            return false;
        }
        if (this.allowed.userIds.has(sender.id)) {
            return true;
        }
        return sender.handle !== undefined && this.allowed.usernames.has(sender.handle.toLowerCase());
    }

    conversationIsAuthorized(message: GatewayMessage): boolean {
        if (this.authorized.has(message.conversationId)) {
            return true;
        }
        const handle = message.conversationHandle;
        return handle !== undefined && this.allowed.chatUsernames.has(handle.toLowerCase());
    }

    /**
     * Authorizes the conversation when the sender is allowed and reports whether the message may proceed.
     */
    admit(message: GatewayMessage): boolean {
        if (this.senderIsAllowed(message)) {
            this.authorized.add(message.conversationId);
            return true;
        }
        return this.conversationIsAuthorized(message);
    }
}
