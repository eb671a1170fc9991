import path from "node:path";

/**
 * Reduces a client-supplied file name to a safe basename.
 * Expects: the result never contains a path separator or a `..` run; blank input becomes `upload`.
 */
export function filenameSanitize(name: string | null | undefined): string {
    if (!name) {
        return "upload";
    }
    const base = path.posix.basename(name.replace(/\\/g, "/"));
    const cleaned = base.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/\.{2,}/g, ".");
    if (cleaned.length === 0 || cleaned === ".") {
        return "upload";
    }
    return cleaned;
}
