import { createLogger } from "../utils/logger";
import type { MetadataLookup } from "./musicbrainz";
import { RecordKind, type CacheKey, type ResolvedRecord, type TrackMetadata } from "./types";

const log = createLogger("RecordResolver");

/**
 * Picks the MusicBrainz record whose cover should be tried for a track.
 *
 * With a release MBID on the track, the release itself is used when
 * MusicBrainz reports a front cover for it, otherwise its release group
 * (which may still carry community-contributed art). Without one, the
 * first release group of an artist/album search is used; no further
 * scoring happens.
 */
export class RecordResolver {
    constructor(private readonly musicBrainz: MetadataLookup) {}

    async resolve(track: TrackMetadata, key: CacheKey): Promise<ResolvedRecord | null> {
        if (track.releaseMbid) {
            return this.resolveRelease(track.releaseMbid);
        }
        return this.searchReleaseGroup(key);
    }

    private async resolveRelease(releaseMbid: string): Promise<ResolvedRecord | null> {
        const release = await this.musicBrainz.getRelease(releaseMbid);
        if (!release) {
            return null;
        }

        if (release["cover-art-archive"].front) {
            return { id: release.id, kind: RecordKind.Release };
        }

        log.debug(
            `Release ${release.id} has no front cover, falling back to release group ${release["release-group"].id}`
        );
        return { id: release["release-group"].id, kind: RecordKind.ReleaseGroup };
    }

    private async searchReleaseGroup(key: CacheKey): Promise<ResolvedRecord | null> {
        const releaseGroups = await this.musicBrainz.searchReleaseGroups(key.artist, key.album, 1);
        const first = releaseGroups?.[0];
        if (!first) {
            log.debug(`No release group found for ${key.artist} - ${key.album}`);
            return null;
        }
        return { id: first.id, kind: RecordKind.ReleaseGroup };
    }
}
