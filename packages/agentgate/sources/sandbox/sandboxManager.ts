import { promises as fs } from "node:fs";
import path from "node:path";

import { createId } from "@paralleldrive/cuid2";

import type { Sandbox, SandboxEnsureOptions } from "@/types";
import { getLogger } from "../log.js";
import { filenameSanitize } from "../util/filenameSanitize.js";
import { fsErrorIsNotFound } from "../util/fsErrorIsNotFound.js";
import { KeyedLock } from "../util/keyedLock.js";

const logger = getLogger("sandbox");

export const SANDBOX_LINK_DIRNAME = ".agentgate-sandboxes";

export type SandboxManagerOptions = {
    sandboxRoot: string;
    agentWorkdir: string;
};

/**
 * Owns one quarantine directory per conversation and exposes it inside the agent workdir through a symlink.
 * Expects: sandboxRoot sits outside agentWorkdir; ensure calls for one conversation are serialized.
 */
export class SandboxManager {
    readonly sandboxRoot: string;
    readonly agentWorkdir: string;
    private readonly sandboxes = new Map<number, Sandbox>();
    private readonly lock = new KeyedLock<number>();

    constructor(options: SandboxManagerOptions) {
        this.sandboxRoot = path.resolve(options.sandboxRoot);
        this.agentWorkdir = path.resolve(options.agentWorkdir);
    }

    get(conversationId: number): Sandbox | undefined {
        return this.sandboxes.get(conversationId);
    }

    /**
     * Returns the conversation's current sandbox, creating one when missing or when forceNew is set.
     * Expects: sandboxId (sanitized) names the new sandbox; a random id is used otherwise.
     */
    async ensure(conversationId: number, options: SandboxEnsureOptions = {}): Promise<Sandbox> {
        return this.lock.inLock(conversationId, async () => {
            const existing = this.sandboxes.get(conversationId);
            if (existing && !options.forceNew) {
                return existing;
            }

            const id = filenameSanitize(options.sandboxId ? options.sandboxId : createId());
            const rootPath = path.join(this.sandboxRoot, String(conversationId), id);
            const uploadsPath = path.join(rootPath, "uploads");
            const workPath = path.join(rootPath, "work");
            const notesPath = path.join(rootPath, "notes");
            for (const dir of [uploadsPath, workPath, notesPath]) {
                await fs.mkdir(dir, { recursive: true });
            }
            const exposedLink = await this.linkReplace(conversationId, id, rootPath);

            const sandbox: Sandbox = { id, rootPath, uploadsPath, workPath, notesPath, exposedLink };
            this.sandboxes.set(conversationId, sandbox);
            logger.info({ conversationId, sandboxId: id, previous: existing?.id }, "event: Sandbox ready");
            return sandbox;
        });
    }

    private async linkReplace(conversationId: number, id: string, target: string): Promise<string> {
        const linkDir = path.join(this.agentWorkdir, SANDBOX_LINK_DIRNAME, String(conversationId));
        await fs.mkdir(linkDir, { recursive: true });
        const linkPath = path.join(linkDir, id);

        const stats = await fs.lstat(linkPath).catch((error: unknown) => {
            if (fsErrorIsNotFound(error)) {
                return null;
            }
            throw error;
        });
        if (stats?.isDirectory()) {
            await fs.rm(linkPath, { recursive: true, force: true }).catch((error: unknown) => {
                logger.debug({ error, linkPath }, "skip: Stale sandbox link directory only partly removed");
            });
        } else if (stats) {
            await fs.unlink(linkPath);
        }

        await fs.symlink(target, linkPath, "dir");
        return linkPath;
    }
}
