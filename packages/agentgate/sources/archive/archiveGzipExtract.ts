import { createReadStream, createWriteStream, promises as fs } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";

import { getLogger } from "../log.js";
import { archiveEntryTargetResolve } from "./archiveEntryTargetResolve.js";

const logger = getLogger("archive.gzip");

/**
 * Decompresses a single gzip stream into destination, dropping the `.gz` suffix.
 * Returns the written file path, or null when that path would leave destination.
 */
export async function archiveGzipExtract(archivePath: string, destination: string): Promise<string | null> {
    const name = path.basename(archivePath);
    const targetName = name.toLowerCase().endsWith(".gz") ? name.slice(0, -3) : name;
    await fs.mkdir(destination, { recursive: true });
    const target = archiveEntryTargetResolve(destination, targetName.length > 0 ? targetName : "archive");
    if (!target) {
        logger.debug({ archivePath }, "skip: Gzip target outside destination");
        return null;
    }
    await pipeline(createReadStream(archivePath), createGunzip(), createWriteStream(target));
    return target;
}
