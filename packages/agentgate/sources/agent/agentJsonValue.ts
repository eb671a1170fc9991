/**
 * Tagged view of one decoded JSON value from the agent event stream.
 */
export type AgentJsonValue =
    | { kind: "null" }
    | { kind: "string"; value: string }
    | { kind: "scalar"; value: number | boolean }
    | { kind: "array"; items: AgentJsonValue[] }
    | { kind: "object"; fields: Map<string, AgentJsonValue> };

export type AgentJsonObject = Extract<AgentJsonValue, { kind: "object" }>;

export function agentJsonValueFrom(raw: unknown): AgentJsonValue {
    if (typeof raw === "string") {
        return { kind: "string", value: raw };
    }
    if (typeof raw === "number" || typeof raw === "boolean") {
        return { kind: "scalar", value: raw };
    }
    if (Array.isArray(raw)) {
        return { kind: "array", items: raw.map((item: unknown) => agentJsonValueFrom(item)) };
    }
    if (typeof raw === "object" && raw !== null) {
        const fields = new Map<string, AgentJsonValue>();
        for (const [key, value] of Object.entries(raw)) {
            fields.set(key, agentJsonValueFrom(value));
        }
        return { kind: "object", fields };
    }
    return { kind: "null" };
}

/**
 * Decodes one line of the event stream.
 * Returns null when the line is not valid JSON.
 */
export function agentJsonLineParse(line: string): AgentJsonValue | null {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch {
        return null;
    }
    return agentJsonValueFrom(raw);
}

export function agentJsonString(value: AgentJsonValue | undefined): string | null {
    return value?.kind === "string" ? value.value : null;
}
