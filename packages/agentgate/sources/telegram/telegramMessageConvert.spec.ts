import type TelegramBot from "node-telegram-bot-api";
import { describe, expect, it } from "vitest";

import { telegramMessageConvert } from "./telegramMessageConvert.js";

describe("telegramMessageConvert", () => {
    it("maps a group text message with mentions and a reply", () => {
        const message: TelegramBot.Message = {
            message_id: 3,
            date: 0,
            chat: { id: -100, type: "supergroup", username: "ops_room" },
            from: { id: 42, is_bot: false, first_name: "Ana", username: "ana" },
            text: "@gate_bot check",
            entities: [
                { type: "mention", offset: 0, length: 9 },
                { type: "text_mention", offset: 10, length: 5, user: { id: 900, is_bot: true, first_name: "Gate" } },
                { type: "bold", offset: 10, length: 5 }
            ],
            reply_to_message: {
                message_id: 2,
                date: 0,
                chat: { id: -100, type: "supergroup" },
                from: { id: 900, is_bot: true, first_name: "Gate", username: "gate_bot" }
            }
        };

        expect(telegramMessageConvert(message)).toEqual({
            conversationId: -100,
            conversationType: "supergroup",
            conversationHandle: "ops_room",
            messageId: 3,
            sender: { id: 42, isBot: false, handle: "ana", firstName: "Ana" },
            text: "@gate_bot check",
            caption: null,
            entities: [
                { kind: "mention", offset: 0, length: 9 },
                { kind: "text_mention", offset: 10, length: 5, mentionedUserId: 900 },
                { kind: "other", offset: 10, length: 5 }
            ],
            replyTo: { sender: { id: 900, isBot: true, handle: "gate_bot", firstName: "Gate" } }
        });
    });

    it("maps documents and captions", () => {
        const message: TelegramBot.Message = {
            message_id: 8,
            date: 0,
            chat: { id: 42, type: "private" },
            caption: "look at this",
            document: { file_id: "f1", file_unique_id: "u1", file_name: "logs.zip", file_size: 120 }
        };

        const converted = telegramMessageConvert(message);

        expect(converted.text).toBeNull();
        expect(converted.caption).toBe("look at this");
        expect(converted.entities).toEqual([]);
        expect(converted.sender).toBeUndefined();
        expect(converted.document).toEqual({ fileId: "f1", fileUniqueId: "u1", fileName: "logs.zip", fileSize: 120 });
    });

    it("keeps a reply marker when the replied message has no sender", () => {
        const message: TelegramBot.Message = {
            message_id: 9,
            date: 0,
            chat: { id: 42, type: "private" },
            text: "ok",
            reply_to_message: { message_id: 1, date: 0, chat: { id: 42, type: "private" } }
        };

        expect(telegramMessageConvert(message).replyTo).toEqual({});
    });
});
