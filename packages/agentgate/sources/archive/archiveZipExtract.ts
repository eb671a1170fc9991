import { createWriteStream, promises as fs } from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import yauzl, { type Entry, type ZipFile } from "yauzl";

import { getLogger } from "../log.js";
import { archiveEntryTargetResolve } from "./archiveEntryTargetResolve.js";

const logger = getLogger("archive.zip");

const UTF8_NAME_FLAG = 0x800;

/**
 * Extracts regular files from a zip into destination, one entry at a time.
 * Expects: members escaping destination are skipped; extraction stops after maxFiles files.
 */
export async function archiveZipExtract(archivePath: string, destination: string, maxFiles: number): Promise<number> {
    const zipfile = await zipOpen(archivePath);
    let count = 0;

    const entryExtract = async (entry: Entry): Promise<void> => {
        const name = zipEntryName(entry);
        const target = archiveEntryTargetResolve(destination, name);
        if (!target) {
            logger.debug({ entry: name }, "skip: Zip member outside destination");
            return;
        }
        if (name.endsWith("/")) {
            await fs.mkdir(target, { recursive: true });
            return;
        }
        await fs.mkdir(path.dirname(target), { recursive: true });
        const stream = await zipEntryOpen(zipfile, entry);
        await pipeline(stream, createWriteStream(target));
        count += 1;
    };

    try {
        return await new Promise<number>((resolve, reject) => {
            zipfile.on("error", reject);
            zipfile.on("end", () => resolve(count));
            zipfile.on("entry", (entry: Entry) => {
                void entryExtract(entry).then(() => {
                    if (count >= maxFiles) {
                        resolve(count);
                        return;
                    }
                    zipfile.readEntry();
                }, reject);
            });
            zipfile.readEntry();
        });
    } finally {
        zipfile.close();
    }
}

function zipOpen(archivePath: string): Promise<ZipFile> {
    return new Promise((resolve, reject) => {
        yauzl.open(archivePath, { lazyEntries: true, autoClose: false, decodeStrings: false }, (error, zipfile) => {
            if (error || !zipfile) {
                reject(error ?? new Error(`Unable to open zip archive: ${archivePath}`));
                return;
            }
            resolve(zipfile);
        });
    });
}

function zipEntryOpen(zipfile: ZipFile, entry: Entry): Promise<Readable> {
    return new Promise((resolve, reject) => {
        zipfile.openReadStream(entry, (error, stream) => {
            if (error || !stream) {
                reject(error ?? new Error("Unable to read zip entry"));
                return;
            }
            resolve(stream);
        });
    });
}

function zipEntryName(entry: Entry): string {
    // Raw bytes: names are left undecoded so traversal members can be skipped instead of failing the archive.
    const raw: unknown = entry.fileName;
    const name = Buffer.isBuffer(raw)
        ? raw.toString((entry.generalPurposeBitFlag & UTF8_NAME_FLAG) !== 0 ? "utf8" : "latin1")
        : String(raw);
    return name.replace(/\\/g, "/");
}
