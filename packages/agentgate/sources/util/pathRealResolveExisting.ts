import { lstatSync, readlinkSync, realpathSync } from "node:fs";
import path from "node:path";

/**
 * Resolves symlinks along the deepest existing part of target and appends the missing tail.
 * Expects: target may not exist yet; dangling links are followed to where a write would land.
 */
export function pathRealResolveExisting(target: string): string {
    let current = path.resolve(target);
    const missing: string[] = [];
    for (;;) {
        try {
            return path.join(realpathSync(current), ...missing);
        } catch (error) {
            if (!pathMissingIs(error)) {
                throw error;
            }
            const link = danglingLinkRead(current);
            if (link !== null) {
                return pathRealResolveExisting(path.join(path.resolve(path.dirname(current), link), ...missing));
            }
            const parent = path.dirname(current);
            if (parent === current) {
                return path.resolve(target);
            }
            missing.unshift(path.basename(current));
            current = parent;
        }
    }
}

/**
 * Reports whether target stays inside base once both are resolved through the filesystem.
 */
export function pathRealIsWithin(base: string, target: string): boolean {
    const relative = path.relative(pathRealResolveExisting(base), pathRealResolveExisting(target));
    return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

function danglingLinkRead(target: string): string | null {
    try {
        return lstatSync(target).isSymbolicLink() ? readlinkSync(target) : null;
    } catch (error) {
        if (pathMissingIs(error)) {
            return null;
        }
        throw error;
    }
}

function pathMissingIs(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        (error.code === "ENOENT" || error.code === "ENOTDIR")
    );
}
