import * as path from "path";
import { parseFile, type IAudioMetadata } from "music-metadata";
import { AppError, ErrorCategory, ErrorCode, wrapNodeError } from "../utils/errors";
import type { TrackMetadata } from "./types";

function nonEmpty(value: string | undefined | null): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

/** Maps parsed tags onto the shape the resolver consumes. */
export function toTrackMetadata(metadata: IAudioMetadata, relativePath: string): TrackMetadata {
    const { common, format } = metadata;
    const trackNo = common.track.no;

    return {
        artist: nonEmpty(common.artist),
        albumArtist: nonEmpty(common.albumartist),
        album: nonEmpty(common.album),
        title: nonEmpty(common.title),
        trackNumber: trackNo !== null && trackNo !== undefined ? String(trackNo) : undefined,
        date: nonEmpty(common.date) ?? (common.year !== undefined ? String(common.year) : undefined),
        durationSecs: format.duration,
        releaseMbid: nonEmpty(common.musicbrainz_albumid),
        relativePath,
    };
}

/**
 * Reads the tags of a file under the music root. Covers are skipped here;
 * extraction is left to the pending queue.
 */
export async function readTrackMetadata(
    musicRoot: string,
    relativePath: string
): Promise<TrackMetadata> {
    const absolutePath = path.join(musicRoot, relativePath);

    let metadata: IAudioMetadata;
    try {
        metadata = await parseFile(absolutePath, { skipCovers: true, duration: true });
    } catch (err) {
        const wrapped = wrapNodeError(err, absolutePath);
        if (wrapped.code === ErrorCode.FILE_READ_ERROR) {
            throw new AppError(
                ErrorCode.METADATA_PARSE_ERROR,
                ErrorCategory.RECOVERABLE,
                `Could not parse tags of ${relativePath}`,
                wrapped.details
            );
        }
        throw wrapped;
    }

    return toTrackMetadata(metadata, relativePath);
}
