import { agentAnswerExtract } from "./agentAnswerExtract.js";
import { agentJsonLineParse } from "./agentJsonValue.js";
import { agentSessionIdExtract } from "./agentSessionIdExtract.js";

export type AgentStreamResult = {
    answerText?: string;
    sessionId?: string;
};

/**
 * Scans the agent's JSON-lines output for the final answer and the session id.
 * Expects: the first declared session id wins, the last non-empty answer wins, and bad lines are ignored.
 */
export function agentStreamParse(output: string): AgentStreamResult {
    let answer = "";
    let sessionId: string | undefined;

    for (const rawLine of output.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) {
            continue;
        }
        const event = agentJsonLineParse(line);
        if (event?.kind !== "object") {
            continue;
        }
        if (sessionId === undefined) {
            sessionId = agentSessionIdExtract(event) ?? undefined;
        }
        const candidate = agentAnswerExtract(event);
        if (candidate) {
            answer = candidate;
        }
    }

    const answerText = answer.trim();
    return {
        answerText: answerText.length > 0 ? answerText : undefined,
        sessionId
    };
}
