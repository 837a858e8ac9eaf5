import type { TrackArtConfig } from "./config";
import { AlbumArtResolver } from "./services/albumArt";
import { CoverArtService } from "./services/coverArt";
import { CoverArtExtractor } from "./services/coverArtExtractor";
import { MusicBrainzService } from "./services/musicbrainz";
import { PendingQueue } from "./services/pendingQueue";
import { RecordResolver } from "./services/recordResolver";

export { loadConfig, type TrackArtConfig } from "./config";
export { AlbumArtResolver, type AlbumArtResolverDeps, type CoverProbe } from "./services/albumArt";
export { CoverArtService, buildCoverUrl, type CoverProbeResult } from "./services/coverArt";
export { CoverArtExtractor, type EmbeddedCoverExtractor } from "./services/coverArtExtractor";
export { MusicBrainzService, type MetadataLookup } from "./services/musicbrainz";
export {
    PendingQueue,
    deriveQueueKey,
    type PendingSidecar,
    type QueueOutcome,
} from "./services/pendingQueue";
export { RecordResolver } from "./services/recordResolver";
export { ResolutionCache } from "./services/resolutionCache";
export { readTrackMetadata, toTrackMetadata } from "./services/trackMetadata";
export {
    RecordKind,
    getCacheKey,
    recordKindPath,
    type CacheKey,
    type PendingReason,
    type ResolvedRecord,
    type TrackMetadata,
} from "./services/types";
export { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
export { sanitizeForFilename } from "./utils/sanitize";

/** Wires the production services from a loaded configuration. */
export function createAlbumArtResolver(config: TrackArtConfig): AlbumArtResolver {
    const musicBrainz = new MusicBrainzService({
        baseUrl: config.musicBrainzBaseUrl,
        userAgent: config.userAgent,
        timeoutMs: config.httpTimeoutMs,
    });
    const coverArt = new CoverArtService({
        archiveHost: config.coverArtArchiveHost,
        userAgent: config.userAgent,
        timeoutMs: config.httpTimeoutMs,
    });
    const pendingQueue = new PendingQueue({
        pendingDir: config.pendingCoversDir,
        musicRoot: config.musicRoot,
        extractor: new CoverArtExtractor(config.ffmpegPath),
        extractionConcurrency: config.extractionConcurrency,
    });

    return new AlbumArtResolver({
        resolver: new RecordResolver(musicBrainz),
        probe: coverArt,
        pendingQueue,
    });
}
