import { getLogger } from "../log.js";
import { agentCommandBuild, type AgentCommandOptions } from "./agentCommandBuild.js";
import { AGENT_PROCESS_FAILED_TEXT, AgentProcessError } from "./agentErrors.js";
import { agentProcessRun } from "./agentProcessRun.js";
import { agentStreamParse } from "./agentStreamParse.js";

const logger = getLogger("agent.invoker");

export type AgentInvokerOptions = AgentCommandOptions & {
    env?: NodeJS.ProcessEnv;
};

export type AgentInvokeOptions = {
    allowFailure?: boolean;
};

export type AgentInvocationResult = {
    answerText?: string;
    sessionId?: string;
    errorText?: string;
};

/**
 * Runs the external agent once per request and interprets its event stream.
 */
export class AgentInvoker {
    private readonly options: AgentInvokerOptions;

    constructor(options: AgentInvokerOptions) {
        this.options = options;
    }

    /**
     * Invokes the agent in workdir, resuming sessionId when given.
     * Expects: a non-zero exit throws AgentProcessError carrying trimmed stderr unless allowFailure is set.
     */
    async invoke(
        prompt: string,
        workdir: string,
        sessionId?: string,
        invokeOptions: AgentInvokeOptions = {}
    ): Promise<AgentInvocationResult> {
        const command = agentCommandBuild(this.options, prompt, workdir, sessionId);
        const startedAt = Date.now();
        logger.debug(
            { command: command.command, args: command.args.join(" "), resumed: Boolean(sessionId) },
            "start: Running agent"
        );

        const output = await agentProcessRun(command, this.options.env);
        const elapsedMs = Date.now() - startedAt;

        if (output.exitCode !== 0) {
            const errorText = output.stderr.trim() || AGENT_PROCESS_FAILED_TEXT;
            logger.warn({ exitCode: output.exitCode, signal: output.signal, elapsedMs }, "error: Agent exited with failure");
            if (invokeOptions.allowFailure) {
                return { sessionId, errorText };
            }
            throw new AgentProcessError(errorText, { exitCode: output.exitCode });
        }

        const parsed = agentStreamParse(output.stdout);
        logger.debug(
            { elapsedMs, sessionId: parsed.sessionId, hasAnswer: parsed.answerText !== undefined },
            "event: Agent finished"
        );
        return {
            answerText: parsed.answerText,
            sessionId: parsed.sessionId ?? sessionId
        };
    }
}
