import path from "node:path";

import { pathRealIsWithin } from "../util/pathRealResolveExisting.js";

/**
 * Resolves an archive member name under destination.
 * Returns null when the member would land outside destination or on destination itself,
 * either by name or through a symlink already present on disk.
 */
export function archiveEntryTargetResolve(destination: string, entryName: string): string | null {
    const base = path.resolve(destination);
    const target = path.resolve(base, entryName.replace(/\\/g, "/"));
    const relative = path.relative(base, target);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
        return null;
    }
    if (!pathRealIsWithin(base, target)) {
        return null;
    }
    return target;
}
