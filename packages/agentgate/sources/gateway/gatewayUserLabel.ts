import type { GatewayUser } from "@/types";

/**
 * Picks the display label for a chat participant.
 * Expects: handle wins over names; the numeric id is the last resort.
 */
export function gatewayUserLabel(user: GatewayUser | undefined): string {
    if (!user) {
        return "unknown";
    }
    return user.handle || user.firstName || user.lastName || String(user.id);
}
