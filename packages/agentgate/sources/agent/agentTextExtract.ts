import type { AgentJsonValue } from "@/types";

const TEXT_FIELDS = ["text", "content", "value", "output_text"];

/**
 * Flattens a message payload into plain text.
 * Expects: arrays are concatenated in order; objects use the first present text field.
 */
export function agentTextExtract(value: AgentJsonValue | undefined): string {
    if (!value) {
        return "";
    }
    switch (value.kind) {
        case "string":
            return value.value;
        case "array":
            return value.items.map((item) => agentTextExtract(item)).join("");
        case "object": {
            for (const key of TEXT_FIELDS) {
                const field = value.fields.get(key);
                if (field) {
                    return agentTextExtract(field);
                }
            }
            return "";
        }
        default:
            return "";
    }
}
