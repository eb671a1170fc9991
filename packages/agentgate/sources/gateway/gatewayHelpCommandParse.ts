const HELP_COMMAND = /^\/help(?:@([A-Za-z0-9_]+))?(?=\s|$)/;

export type GatewayHelpCommand = {
    /** Bot handle named after `@`, or null for a bare `/help`. */
    botHandle: string | null;
};

/**
 * Recognizes `/help` and `/help@handle` as the first token of a message.
 * Returns null for any other text, including `/helpme`.
 */
export function gatewayHelpCommandParse(text: string | null): GatewayHelpCommand | null {
    const match = text ? HELP_COMMAND.exec(text) : null;
    if (!match) {
        return null;
    }
    return { botHandle: match[1] ?? null };
}
