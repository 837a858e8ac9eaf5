import PQueue from "p-queue";
import { createLogger } from "../utils/logger";
import type { CoverProbeResult } from "./coverArt";
import type { PendingQueue } from "./pendingQueue";
import type { RecordResolver } from "./recordResolver";
import { ResolutionCache } from "./resolutionCache";
import { getCacheKey, type ResolvedRecord, type TrackMetadata } from "./types";

const log = createLogger("AlbumArt");

export interface CoverProbe {
    probe(record: ResolvedRecord): Promise<CoverProbeResult>;
}

export interface AlbumArtResolverDeps {
    resolver: Pick<RecordResolver, "resolve">;
    probe: CoverProbe;
    pendingQueue: Pick<PendingQueue, "enqueue">;
    cache?: ResolutionCache;
}

/**
 * Resolves the front-cover URL of the playing track:
 * cache → MusicBrainz → Cover Art Archive probe, queuing misses for review.
 *
 * Lookups on one instance run strictly one at a time; the cache is read
 * and written within a single lookup and is not safe to interleave.
 */
export class AlbumArtResolver {
    private readonly resolver: AlbumArtResolverDeps["resolver"];
    private readonly probe: CoverProbe;
    private readonly pendingQueue: AlbumArtResolverDeps["pendingQueue"];
    private readonly cache: ResolutionCache;
    private readonly lookups = new PQueue({ concurrency: 1 });

    constructor(deps: AlbumArtResolverDeps) {
        this.resolver = deps.resolver;
        this.probe = deps.probe;
        this.pendingQueue = deps.pendingQueue;
        this.cache = deps.cache ?? new ResolutionCache();
    }

    /**
     * Returns a confirmed cover URL, or null. Network and lookup problems
     * degrade to null; only a malformed MusicBrainz search response rejects
     * (with an `AppError` of code MALFORMED_SEARCH_RESPONSE).
     */
    getAlbumArtUrl(track: TrackMetadata): Promise<string | null> {
        return this.lookups.add(() => this.lookup(track));
    }

    private async lookup(track: TrackMetadata): Promise<string | null> {
        const key = getCacheKey(track);
        if (!key) {
            return null;
        }

        let record = this.cache.lookup(key);
        if (record) {
            log.debug(`Cache hit for ${key.artist} - ${key.album}`, { ...record });
        } else {
            const resolved = await this.resolver.resolve(track, key);
            if (!resolved) {
                await this.pendingQueue.enqueue(track, null, "no_mb_match");
                return null;
            }
            // Stored before probing so a missing image doesn't trigger another search next time.
            this.cache.store(key, resolved);
            record = resolved;
        }

        const { url, exists } = await this.probe.probe(record);
        if (exists) {
            return url;
        }

        await this.pendingQueue.enqueue(track, track.releaseMbid || null, "missing_caa");
        return null;
    }
}
