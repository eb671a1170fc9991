import { describe, expect, it } from "vitest";

import { filenameSanitize } from "./filenameSanitize.js";

describe("filenameSanitize", () => {
    it("keeps only the basename", () => {
        expect(filenameSanitize("../../evil")).toBe("evil");
        expect(filenameSanitize("C:\\logs\\app.log")).toBe("app.log");
    });

    it("replaces runs of unsafe characters with a single underscore", () => {
        expect(filenameSanitize("ok name!.txt")).toBe("ok_name_.txt");
        expect(filenameSanitize("отчёт 2024.zip")).toBe("_2024.zip");
    });

    it("collapses dot runs", () => {
        expect(filenameSanitize("a..b.log")).toBe("a.b.log");
    });

    it("falls back to upload for empty names", () => {
        expect(filenameSanitize("")).toBe("upload");
        expect(filenameSanitize(undefined)).toBe("upload");
        expect(filenameSanitize("..")).toBe("upload");
        expect(filenameSanitize("dir/")).toBe("dir");
    });
});
