export type ArchiveKind = "zip" | "tar" | "gzip" | "unknown";

export const ARCHIVE_MAX_FILES = 2000;
