/**
 * Tag values for one track, as handed over by the player or read from the file.
 * Owned by the caller; nothing in the pipeline mutates it.
 */
export interface TrackMetadata {
    artist?: string;
    albumArtist?: string;
    album?: string;
    title?: string;
    trackNumber?: string;
    date?: string;
    durationSecs?: number;
    /** MusicBrainz release MBID, when the file is tagged with one. */
    releaseMbid?: string;
    /** Path relative to the music root. */
    relativePath: string;
}

export interface CacheKey {
    artist: string;
    album: string;
}

export enum RecordKind {
    Release = "release",
    ReleaseGroup = "release-group",
}

export interface ResolvedRecord {
    id: string;
    kind: RecordKind;
}

export type PendingReason = "missing_caa" | "no_mb_match";

/** Path segment used by the Cover Art Archive for each record kind. */
export function recordKindPath(kind: RecordKind): string {
    switch (kind) {
        case RecordKind.Release:
            return "release";
        case RecordKind.ReleaseGroup:
            return "release-group";
    }
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
    for (const value of values) {
        if (value !== undefined && value.length > 0) {
            return value;
        }
    }
    return undefined;
}

/**
 * Album artist is preferred over track artist so that compilations and
 * featured-artist tracks share one cache entry.
 */
export function getCacheKey(track: TrackMetadata): CacheKey | null {
    const artist = firstNonEmpty(track.albumArtist, track.artist);
    const album = firstNonEmpty(track.album);

    if (!artist || !album) {
        return null;
    }

    return { artist, album };
}
