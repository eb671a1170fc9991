import { createReadStream, promises as fs } from "node:fs";
import path from "node:path";
import { createGunzip } from "node:zlib";

import type { ArchiveKind } from "@/types";
import { getLogger } from "../log.js";

const logger = getLogger("archive.detect");

const TAR_BLOCK_SIZE = 512;

/**
 * Sniffs the archive kind from content, not from the file name.
 * Expects: a gzip stream wrapping a tar is reported as tar; a `.tar.gz` name whose content is not a tar is unknown.
 */
export async function archiveKindDetect(filePath: string): Promise<ArchiveKind> {
    const head = await fileHeadRead(filePath, TAR_BLOCK_SIZE);
    if (zipSignatureIs(head)) {
        return "zip";
    }
    if (tarHeaderIs(head)) {
        return "tar";
    }
    if (!gzipMagicIs(head)) {
        return "unknown";
    }

    const inflated = await gzipHeadRead(filePath, TAR_BLOCK_SIZE);
    if (inflated && tarHeaderIs(inflated)) {
        return "tar";
    }
    const name = path.basename(filePath).toLowerCase();
    if (name.endsWith(".tar.gz") || name.endsWith(".tgz")) {
        return "unknown";
    }
    return "gzip";
}

export function zipSignatureIs(head: Buffer): boolean {
    if (head.length < 4 || head[0] !== 0x50 || head[1] !== 0x4b) {
        return false;
    }
    return (head[2] === 0x03 && head[3] === 0x04) || (head[2] === 0x05 && head[3] === 0x06);
}

export function gzipMagicIs(head: Buffer): boolean {
    return head.length >= 2 && head[0] === 0x1f && head[1] === 0x8b;
}

/**
 * Checks a 512-byte block for a tar header by the ustar magic or a valid header checksum.
 */
export function tarHeaderIs(block: Buffer): boolean {
    if (block.length < TAR_BLOCK_SIZE) {
        return false;
    }
    if (block.toString("ascii", 257, 262) === "ustar") {
        return true;
    }
    const storedText = block.toString("ascii", 148, 156).replace(/\0.*$/s, "").trim();
    if (!/^[0-7]+$/.test(storedText)) {
        return false;
    }
    let sum = 0;
    for (let index = 0; index < TAR_BLOCK_SIZE; index += 1) {
        sum += index >= 148 && index < 156 ? 0x20 : (block[index] ?? 0);
    }
    return sum === parseInt(storedText, 8);
}

async function fileHeadRead(filePath: string, size: number): Promise<Buffer> {
    const handle = await fs.open(filePath, "r");
    try {
        const buffer = Buffer.alloc(size);
        const { bytesRead } = await handle.read(buffer, 0, size, 0);
        return buffer.subarray(0, bytesRead);
    } finally {
        await handle.close();
    }
}

async function gzipHeadRead(filePath: string, size: number): Promise<Buffer | null> {
    const source = createReadStream(filePath);
    const gunzip = createGunzip();
    const chunks: Buffer[] = [];
    let total = 0;
    try {
        for await (const chunk of source.pipe(gunzip)) {
            const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
            chunks.push(buffer);
            total += buffer.length;
            if (total >= size) {
                break;
            }
        }
    } catch (error) {
        logger.debug({ error, filePath }, "skip: Gzip stream is not readable");
        return null;
    } finally {
        source.destroy();
        gunzip.destroy();
    }
    return Buffer.concat(chunks).subarray(0, size);
}
