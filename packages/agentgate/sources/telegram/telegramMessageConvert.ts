import type TelegramBot from "node-telegram-bot-api";

import type { GatewayEntity, GatewayMessage, GatewayUser } from "@/types";

/**
 * Maps a Telegram update message into the gateway's message shape.
 * Expects: only `entities` are mapped; caption entities never carry mentions for the gateway.
 */
export function telegramMessageConvert(message: TelegramBot.Message): GatewayMessage {
    const converted: GatewayMessage = {
        conversationId: message.chat.id,
        conversationType: message.chat.type,
        messageId: message.message_id,
        text: message.text ?? null,
        caption: message.caption ?? null,
        entities: (message.entities ?? []).map(telegramEntityConvert)
    };
    if (message.chat.username) {
        converted.conversationHandle = message.chat.username;
    }
    if (message.from) {
        converted.sender = telegramUserConvert(message.from);
    }
    if (message.reply_to_message) {
        const replyFrom = message.reply_to_message.from;
        converted.replyTo = replyFrom ? { sender: telegramUserConvert(replyFrom) } : {};
    }
    if (message.document) {
        converted.document = {
            fileId: message.document.file_id,
            fileUniqueId: message.document.file_unique_id,
            ...(message.document.file_name ? { fileName: message.document.file_name } : {}),
            ...(message.document.file_size !== undefined ? { fileSize: message.document.file_size } : {})
        };
    }
    return converted;
}

function telegramUserConvert(user: TelegramBot.User): GatewayUser {
    const converted: GatewayUser = { id: user.id, isBot: user.is_bot };
    if (user.username) {
        converted.handle = user.username;
    }
    if (user.first_name) {
        converted.firstName = user.first_name;
    }
    if (user.last_name) {
        converted.lastName = user.last_name;
    }
    return converted;
}

function telegramEntityConvert(entity: TelegramBot.MessageEntity): GatewayEntity {
    if (entity.type === "mention") {
        return { kind: "mention", offset: entity.offset, length: entity.length };
    }
    if (entity.type === "text_mention") {
        return {
            kind: "text_mention",
            offset: entity.offset,
            length: entity.length,
            ...(entity.user ? { mentionedUserId: entity.user.id } : {})
        };
    }
    return { kind: "other", offset: entity.offset, length: entity.length };
}
