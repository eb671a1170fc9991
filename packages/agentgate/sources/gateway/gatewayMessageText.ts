import type { GatewayMessage } from "@/types";

export function gatewayMessageText(message: GatewayMessage): string {
    return message.text ?? message.caption ?? "";
}
