import type { AgentJsonObject, AgentJsonValue } from "@/types";
import { agentJsonString } from "./agentJsonValue.js";

/**
 * Finds the session id an event declares, checking the known locations in priority order.
 * Returns null when the event declares none.
 */
export function agentSessionIdExtract(event: AgentJsonObject): string | null {
    const direct = nonEmptyString(event.fields.get("session_id"));
    if (direct) {
        return direct;
    }

    const type = agentJsonString(event.fields.get("type"));
    const session = event.fields.get("session");
    if (session?.kind === "object") {
        const nested = nonEmptyString(session.fields.get("id"));
        if (nested) {
            return nested;
        }
    } else if (type === "session") {
        const id = nonEmptyString(event.fields.get("id"));
        if (id) {
            return id;
        }
    }

    const thread = nonEmptyString(event.fields.get("thread_id"));
    if (thread) {
        return thread;
    }
    if (type === "thread.started") {
        return nonEmptyString(event.fields.get("id"));
    }
    return null;
}

function nonEmptyString(value: AgentJsonValue | undefined): string | null {
    const text = agentJsonString(value);
    return text ? text : null;
}
