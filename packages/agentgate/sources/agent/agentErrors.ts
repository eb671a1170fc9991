export type AgentErrorKind = "process" | "empty_response";

export const AGENT_PROCESS_FAILED_TEXT = "agent process failed";
export const AGENT_EMPTY_RESPONSE_TEXT = "Empty response from agent";

/**
 * Raised when the agent cannot be started or exits with a non-zero status.
 * Expects: message holds the agent's diagnostic text and is shown to chat users as-is.
 */
export class AgentProcessError extends Error {
    readonly kind: AgentErrorKind = "process";
    readonly exitCode: number | null;

    constructor(message: string, options?: { exitCode?: number | null; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "AgentProcessError";
        this.exitCode = options?.exitCode ?? null;
    }
}

export class AgentEmptyResponseError extends Error {
    readonly kind: AgentErrorKind = "empty_response";

    constructor(message = AGENT_EMPTY_RESPONSE_TEXT) {
        super(message);
        this.name = "AgentEmptyResponseError";
    }
}
