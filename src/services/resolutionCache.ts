import type { CacheKey, ResolvedRecord } from "./types";

/**
 * Process-lifetime memo of (artist, album) → resolved MusicBrainz record.
 * No expiry and no capacity bound. Only successful resolutions are stored.
 */
export class ResolutionCache {
    private readonly entries = new Map<string, ResolvedRecord>();

    // JSON array encoding keeps ("a b", "c") and ("a", "b c") apart.
    private static encode(key: CacheKey): string {
        return JSON.stringify([key.artist, key.album]);
    }

    lookup(key: CacheKey): ResolvedRecord | undefined {
        const hit = this.entries.get(ResolutionCache.encode(key));
        return hit ? { ...hit } : undefined;
    }

    store(key: CacheKey, record: ResolvedRecord): void {
        this.entries.set(ResolutionCache.encode(key), { ...record });
    }

    get size(): number {
        return this.entries.size;
    }
}
