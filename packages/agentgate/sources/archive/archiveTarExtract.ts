import { createWriteStream, mkdirSync } from "node:fs";
import path from "node:path";
import { finished } from "node:stream/promises";

import { list, type ReadEntry } from "tar";

import { getLogger } from "../log.js";
import { archiveEntryTargetResolve } from "./archiveEntryTargetResolve.js";

const logger = getLogger("archive.tar");

const FILE_ENTRY_TYPES = new Set(["File", "OldFile", "ContiguousFile"]);

/**
 * Extracts regular files from a tar (optionally gzip-compressed) into destination.
 * Expects: members escaping destination, links and devices are skipped; extraction stops after maxFiles files.
 * A path that appears twice keeps its first copy, since writes run concurrently with parsing.
 */
export async function archiveTarExtract(archivePath: string, destination: string, maxFiles: number): Promise<number> {
    let count = 0;
    let writeError: unknown = null;
    const writes: Promise<void>[] = [];
    const written = new Set<string>();

    const onReadEntry = (entry: ReadEntry): void => {
        if (count >= maxFiles) {
            return;
        }
        const target = archiveEntryTargetResolve(destination, entry.path);
        if (!target) {
            logger.debug({ entry: entry.path }, "skip: Tar member outside destination");
            return;
        }
        if (entry.type === "Directory") {
            mkdirSync(target, { recursive: true });
            return;
        }
        if (!FILE_ENTRY_TYPES.has(entry.type)) {
            logger.debug({ entry: entry.path, type: entry.type }, "skip: Tar member is not a regular file");
            return;
        }
        if (written.has(target)) {
            logger.debug({ entry: entry.path }, "skip: Tar member repeats an extracted path");
            return;
        }
        written.add(target);
        mkdirSync(path.dirname(target), { recursive: true });
        const output = createWriteStream(target);
        entry.pipe(output);
        writes.push(
            finished(output).catch((error: unknown) => {
                writeError ??= error;
            })
        );
        count += 1;
    };

    await list({ file: archivePath, strict: false, onReadEntry });
    await Promise.all(writes);
    if (writeError) {
        throw writeError;
    }
    return count;
}
