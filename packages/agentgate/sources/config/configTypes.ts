export type AllowedEntries = {
    userIds: Set<number>;
    chatIds: Set<number>;
    usernames: Set<string>;
    chatUsernames: Set<string>;
    unresolved: string[];
};

export type AgentConfig = {
    command: string;
    baseArgs: string[];
    model?: string;
    preamblePath?: string;
};

export type Config = {
    telegramToken: string;
    allowed: AllowedEntries;
    agent: AgentConfig;
    agentWorkdir: string;
    sandboxRoot: string;
    maxUploadBytes: number;
    envPath: string;
};
