import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { gzipSync } from "node:zlib";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { archiveKindDetect, tarHeaderIs } from "./archiveKindDetect.js";
import { tarFixtureBuild, zipFixtureBuild } from "./archiveFixtures.js";

describe("archiveKindDetect", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "agentgate-detect-"));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function detect(name: string, data: Buffer | string) {
        const filePath = path.join(tempDir, name);
        await fs.writeFile(filePath, data);
        return archiveKindDetect(filePath);
    }

    it("detects by content rather than by name", async () => {
        expect(await detect("upload.bin", zipFixtureBuild([{ name: "a.txt", content: "a" }]))).toBe("zip");
        expect(await detect("upload.zip", tarFixtureBuild([{ name: "a.txt", content: "a" }]))).toBe("tar");
        expect(await detect("upload.gz", gzipSync(tarFixtureBuild([{ name: "a.txt", content: "a" }])))).toBe("tar");
        expect(await detect("upload.gz", gzipSync(Buffer.from("plain")))).toBe("gzip");
    });

    it("reports tarball names with other gzip content as unknown", async () => {
        expect(await detect("logs.tar.gz", gzipSync(Buffer.from("plain")))).toBe("unknown");
        expect(await detect("logs.tgz", gzipSync(Buffer.from("plain")))).toBe("unknown");
    });

    it("reports short and plain files as unknown", async () => {
        expect(await detect("empty.log", "")).toBe("unknown");
        expect(await detect("app.log", "PK")).toBe("unknown");
        expect(await detect("app.tar", "x".repeat(600))).toBe("unknown");
    });
});

describe("tarHeaderIs", () => {
    it("accepts pre-ustar headers with a valid checksum", () => {
        const block = tarFixtureBuild([{ name: "old.txt", content: "x" }]).subarray(0, 512);
        const legacy = Buffer.from(block);
        legacy.fill(0, 257, 265);
        legacy.fill(0x20, 148, 156);
        let sum = 0;
        for (const byte of legacy) {
            sum += byte;
        }
        legacy.write(`${sum.toString(8).padStart(6, "0")}\0 `, 148, 8, "ascii");

        expect(tarHeaderIs(legacy)).toBe(true);
        expect(tarHeaderIs(Buffer.alloc(512))).toBe(false);
    });
});
