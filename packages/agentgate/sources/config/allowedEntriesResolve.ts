import type { AllowedEntries } from "@/types";

const NUMERIC_ENTRY = /^-?\d+$/;

/**
 * Resolves a comma-separated allow-list of numeric ids, `@username` handles and `t.me/username` links.
 * Expects: numeric entries allow both a user and a chat with that id; usernames are matched case-insensitively.
 */
export function allowedEntriesResolve(raw: string): AllowedEntries {
    const allowed: AllowedEntries = {
        userIds: new Set(),
        chatIds: new Set(),
        usernames: new Set(),
        chatUsernames: new Set(),
        unresolved: []
    };
    const entries = raw
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);

    for (const entry of entries) {
        if (NUMERIC_ENTRY.test(entry)) {
            const id = Number(entry);
            allowed.userIds.add(id);
            allowed.chatIds.add(id);
            continue;
        }
        const username = allowedUsernameExtract(entry);
        if (username) {
            allowed.usernames.add(username.toLowerCase());
            allowed.chatUsernames.add(username.toLowerCase());
            continue;
        }
        allowed.unresolved.push(entry);
    }
    return allowed;
}

export function allowedEntriesEmpty(allowed: AllowedEntries): boolean {
    return allowed.userIds.size === 0 && allowed.chatIds.size === 0 && allowed.usernames.size === 0;
}

/**
 * Extracts a public username from `@name`, `t.me/name` or `https://t.me/name`.
 * Returns null for invite links and other paths.
 */
export function allowedUsernameExtract(raw: string): string | null {
    let value = raw.trim();
    if (value.startsWith("@")) {
        value = value.slice(1);
    }
    for (const prefix of ["https://", "http://"]) {
        if (value.startsWith(prefix)) {
            value = value.slice(prefix.length);
        }
    }
    if (value.startsWith("t.me/")) {
        value = value.slice("t.me/".length);
    }
    if (!value || value.startsWith("+") || value.includes("/")) {
        return null;
    }
    return value;
}
