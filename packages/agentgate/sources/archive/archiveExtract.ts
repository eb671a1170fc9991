import { getLogger } from "../log.js";
import { archiveGzipExtract } from "./archiveGzipExtract.js";
import { archiveKindDetect } from "./archiveKindDetect.js";
import { archiveTarExtract } from "./archiveTarExtract.js";
import { ARCHIVE_MAX_FILES } from "./archiveTypes.js";
import { archiveZipExtract } from "./archiveZipExtract.js";

const logger = getLogger("archive");

/**
 * Unpacks a zip, tar (plain or compressed) or single gzip file into destination.
 * Returns the number of files written; 0 means the file is not an archive.
 */
export async function archiveExtract(
    archivePath: string,
    destination: string,
    maxFiles = ARCHIVE_MAX_FILES
): Promise<number> {
    const kind = await archiveKindDetect(archivePath);
    let count = 0;
    switch (kind) {
        case "zip":
            count = await archiveZipExtract(archivePath, destination, maxFiles);
            break;
        case "tar":
            count = await archiveTarExtract(archivePath, destination, maxFiles);
            break;
        case "gzip":
            count = (await archiveGzipExtract(archivePath, destination)) ? 1 : 0;
            break;
        case "unknown":
            break;
    }
    logger.debug({ archivePath, kind, count }, "event: Archive processed");
    return count;
}
