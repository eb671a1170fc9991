/**
 * Reads the API description from a node-telegram-bot-api error, falling back to the error message.
 */
function telegramErrorDescription(error: unknown): string | null {
    if (!error || typeof error !== "object") {
        return null;
    }
    if (!("code" in error) || error.code !== "ETELEGRAM") {
        return null;
    }
    if ("response" in error && error.response && typeof error.response === "object" && "body" in error.response) {
        const body = error.response.body;
        if (body && typeof body === "object" && "description" in body && typeof body.description === "string") {
            return body.description;
        }
    }
    return error instanceof Error ? error.message : "";
}

export function telegramParseErrorIs(error: unknown): boolean {
    const description = telegramErrorDescription(error)?.toLowerCase();
    if (!description) {
        return false;
    }
    return description.includes("can't parse entities") || description.includes("cant parse entities");
}

export function telegramConflictErrorIs(error: unknown): boolean {
    if (!error || typeof error !== "object" || !("code" in error) || error.code !== "ETELEGRAM") {
        return false;
    }
    if (!("response" in error) || !error.response || typeof error.response !== "object") {
        return false;
    }
    return "statusCode" in error.response && error.response.statusCode === 409;
}
