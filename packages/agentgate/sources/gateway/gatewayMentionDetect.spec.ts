import { describe, expect, it } from "vitest";

import type { GatewayMessage } from "@/types";
import { gatewayMentionDetect } from "./gatewayMentionDetect.js";

const bot = { id: 99, isBot: true, handle: "GateBot" };

function message(overrides: Partial<GatewayMessage>): GatewayMessage {
    return {
        conversationId: -1,
        conversationType: "supergroup",
        messageId: 1,
        text: null,
        caption: null,
        entities: [],
        ...overrides
    };
}

describe("gatewayMentionDetect", () => {
    it("matches @handle mentions case-insensitively", () => {
        const text = "hey @gatebot, look";

        expect(gatewayMentionDetect(message({ text, entities: [{ kind: "mention", offset: 4, length: 8 }] }), bot)).toBe(
            true
        );
    });

    it("ignores mentions of other users", () => {
        const text = "@someone look";

        expect(gatewayMentionDetect(message({ text, entities: [{ kind: "mention", offset: 0, length: 8 }] }), bot)).toBe(
            false
        );
    });

    it("matches text mentions by user id", () => {
        const entities = [{ kind: "text_mention" as const, offset: 0, length: 3, mentionedUserId: 99 }];

        expect(gatewayMentionDetect(message({ text: "Bot help", entities }), bot)).toBe(true);
    });

    it("matches replies to the bot's own messages", () => {
        expect(gatewayMentionDetect(message({ text: "ok", replyTo: { sender: bot } }), bot)).toBe(true);
        expect(
            gatewayMentionDetect(message({ text: "ok", replyTo: { sender: { id: 5, isBot: false } } }), bot)
        ).toBe(false);
    });

    it("requires message text", () => {
        expect(gatewayMentionDetect(message({ caption: "@gatebot", replyTo: { sender: bot } }), bot)).toBe(false);
    });
});
