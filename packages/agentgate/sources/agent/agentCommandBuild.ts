export type AgentCommandOptions = {
    command: string;
    baseArgs: string[];
    model?: string;
    preamble?: string;
};

export type AgentCommand = {
    command: string;
    args: string[];
    cwd?: string;
    input: string;
};

/**
 * Builds the argv for one agent run.
 * Expects: a fresh run points the agent at workdir with `-C`; a resumed run uses workdir as cwd instead.
 * The prompt always travels on stdin (`-`), and the preamble is only prepended to fresh runs.
 */
export function agentCommandBuild(
    options: AgentCommandOptions,
    prompt: string,
    workdir: string,
    sessionId?: string
): AgentCommand {
    const modelArgs = options.model ? ["--model", options.model] : [];
    if (sessionId) {
        return {
            command: options.command,
            args: [...options.baseArgs, "resume", sessionId, "--json", ...modelArgs, "-"],
            cwd: workdir,
            input: prompt
        };
    }
    const preamble = options.preamble?.trim();
    return {
        command: options.command,
        args: [...options.baseArgs, "--json", "-C", workdir, ...modelArgs, "-"],
        input: preamble ? `${preamble}\n\n${prompt}` : prompt
    };
}
