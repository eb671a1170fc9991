import type { AgentJsonObject } from "@/types";
import { agentJsonString } from "./agentJsonValue.js";
import { agentTextExtract } from "./agentTextExtract.js";

const ASSISTANT_MESSAGE_TYPES = new Set(["message", "assistant_message", "final_message", "agent_message"]);

/**
 * Returns the assistant text an event carries, or an empty string.
 * Expects: non-assistant roles are skipped; a recognized event shape never falls through to another shape.
 */
export function agentAnswerExtract(event: AgentJsonObject): string {
    const type = agentJsonString(event.fields.get("type"));
    if (type !== null && ASSISTANT_MESSAGE_TYPES.has(type)) {
        return roleIsAssistant(event) ? agentTextExtract(event) : "";
    }

    if (type === "item.completed") {
        const item = event.fields.get("item");
        if (item?.kind !== "object") {
            return "";
        }
        const itemType = agentJsonString(item.fields.get("type"));
        return itemType !== null && ASSISTANT_MESSAGE_TYPES.has(itemType) ? agentTextExtract(item) : "";
    }

    const message = event.fields.get("message");
    if (message) {
        if (message.kind === "object" && !roleIsAssistant(message)) {
            return "";
        }
        return agentTextExtract(message);
    }

    const response = event.fields.get("response");
    if (response?.kind === "object") {
        return agentTextExtract(response.fields.get("output_text"));
    }
    return "";
}

function roleIsAssistant(payload: AgentJsonObject): boolean {
    const role = payload.fields.get("role");
    if (!role || role.kind === "null") {
        return true;
    }
    return agentJsonString(role) === "assistant";
}
