import { type Dirent, promises as fs } from "node:fs";
import path from "node:path";

import type { Sandbox } from "@/types";
import { fsErrorIsNotFound } from "../util/fsErrorIsNotFound.js";

export const SANDBOX_FILES_LIMIT = 200;

/**
 * Lists regular files under uploads/ then work/, depth-first in name order, relative to the sandbox root.
 * Expects: symlinks are not followed.
 */
export async function sandboxFilesList(sandbox: Sandbox, limit = SANDBOX_FILES_LIMIT): Promise<string[]> {
    const files: string[] = [];
    for (const subdir of ["uploads", "work"]) {
        await directoryWalk(sandbox.rootPath, subdir, files, limit);
        if (files.length >= limit) {
            break;
        }
    }
    return files;
}

async function directoryWalk(root: string, relative: string, files: string[], limit: number): Promise<void> {
    const dirents = await fs
        .readdir(path.join(root, relative), { withFileTypes: true })
        .catch((error: unknown): Dirent[] => {
            if (fsErrorIsNotFound(error)) {
                return [];
            }
            throw error;
        });
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const dirent of dirents) {
        if (files.length >= limit) {
            return;
        }
        const child = path.posix.join(relative, dirent.name);
        if (dirent.isDirectory()) {
            await directoryWalk(root, child, files, limit);
        } else if (dirent.isFile()) {
            files.push(child);
        }
    }
}
