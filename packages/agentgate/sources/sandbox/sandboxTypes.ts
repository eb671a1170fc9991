export type Sandbox = {
    id: string;
    rootPath: string;
    uploadsPath: string;
    workPath: string;
    notesPath: string;
    exposedLink: string;
};

export type SandboxEnsureOptions = {
    sandboxId?: string;
    forceNew?: boolean;
};
