import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import PQueue from "p-queue";
import { AppError, ErrorCategory, ErrorCode, wrapNodeError } from "../utils/errors";
import { fileExists } from "../utils/fileSystem";
import { createLogger, logErrorWithContext } from "../utils/logger";
import { sanitizeForFilename } from "../utils/sanitize";
import type { EmbeddedCoverExtractor } from "./coverArtExtractor";
import type { PendingReason, TrackMetadata } from "./types";

const log = createLogger("PendingQueue");

/** Sidecar written next to each pending image, read by external triage tooling. */
export interface PendingSidecar {
    reason: PendingReason;
    mbid: string | null;
    artist: string;
    album: string;
    title: string;
    trackno: string;
    date: string;
    duration_secs: number;
    source_path: string;
    added_at: string;
}

/** `imageExtracted` is true once `<key>.jpg` is in place. */
export type QueueOutcome =
    | { status: "queued"; key: string; imageExtracted: boolean; sidecarWritten: boolean }
    | { status: "duplicate"; key: string }
    | { status: "failed"; error: AppError };

export interface PendingQueueOptions {
    pendingDir: string;
    musicRoot: string;
    extractor: EmbeddedCoverExtractor;
    extractionConcurrency: number;
    now?: () => Date;
}

/**
 * An MBID is used verbatim; otherwise artist and title are reduced to a
 * filename-safe `nombid_<artist>_<title>`.
 */
export function deriveQueueKey(track: TrackMetadata, mbid: string | null): string {
    if (mbid) {
        return mbid;
    }
    const artist = sanitizeForFilename(track.artist ?? "");
    const title = sanitizeForFilename(track.title ?? "");
    return `nombid_${artist}_${title}`;
}

function toDurationSecs(duration: number | undefined): number {
    if (duration === undefined || !Number.isFinite(duration) || duration <= 0) {
        return 0;
    }
    return Math.floor(duration);
}

function isAlreadyExistsError(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "EEXIST"
    );
}

/**
 * Records tracks whose cover could not be confirmed so they can be fixed
 * up later. Each entry is `<key>.jpg` (embedded art, when extractable) plus
 * `<key>.json`; either file existing marks the key as already queued.
 * Entries are never removed here.
 */
export class PendingQueue {
    private readonly inFlight = new Map<string, Promise<QueueOutcome>>();
    private readonly extractionQueue: PQueue;
    private readonly now: () => Date;

    constructor(private readonly options: PendingQueueOptions) {
        this.extractionQueue = new PQueue({
            concurrency: Math.max(1, options.extractionConcurrency),
        });
        this.now = options.now ?? (() => new Date());
    }

    async enqueue(
        track: TrackMetadata,
        mbid: string | null,
        reason: PendingReason
    ): Promise<QueueOutcome> {
        const dirError = await this.ensurePendingDir();
        if (dirError) {
            return { status: "failed", error: dirError };
        }

        const key = deriveQueueKey(track, mbid);
        const running = this.inFlight.get(key);
        if (running) {
            await running;
            return { status: "duplicate", key };
        }

        const operation = this.queueEntry(track, mbid, reason, key).finally(() => {
            this.inFlight.delete(key);
        });
        this.inFlight.set(key, operation);
        return operation;
    }

    private async ensurePendingDir(): Promise<AppError | null> {
        try {
            await fs.promises.mkdir(this.options.pendingDir, { recursive: true });
            return null;
        } catch (err) {
            const cause = wrapNodeError(err, this.options.pendingDir);
            const error = new AppError(
                ErrorCode.PENDING_QUEUE_UNAVAILABLE,
                cause.category,
                `Failed to create pending covers directory ${this.options.pendingDir}`,
                { cause: cause.code, ...cause.details }
            );
            logErrorWithContext(log, "Pending queue unavailable", error);
            return error;
        }
    }

    private async queueEntry(
        track: TrackMetadata,
        mbid: string | null,
        reason: PendingReason,
        key: string
    ): Promise<QueueOutcome> {
        const imagePath = path.join(this.options.pendingDir, `${key}.jpg`);
        const sidecarPath = path.join(this.options.pendingDir, `${key}.json`);

        if ((await fileExists(imagePath)) || (await fileExists(sidecarPath))) {
            return { status: "duplicate", key };
        }

        // ffmpeg writes to a private staging file; only the writer that creates
        // the sidecar moves its image to <key>.jpg.
        const stagingPath = path.join(this.options.pendingDir, `.${key}.${randomUUID()}.jpg`);
        const sourcePath = path.join(this.options.musicRoot, track.relativePath);
        const imageExtracted = await this.extractionQueue.add(() =>
            this.options.extractor.extract(sourcePath, stagingPath)
        );

        const sidecar: PendingSidecar = {
            reason,
            mbid,
            artist: track.artist ?? "",
            album: track.album ?? "",
            title: track.title ?? "",
            trackno: track.trackNumber ?? "",
            date: track.date ?? "",
            duration_secs: toDurationSecs(track.durationSecs),
            source_path: sourcePath,
            added_at: this.now().toISOString(),
        };

        let sidecarWritten = true;
        try {
            await fs.promises.writeFile(sidecarPath, JSON.stringify(sidecar, null, 2), {
                flag: "wx",
            });
        } catch (err) {
            if (isAlreadyExistsError(err)) {
                await this.discardStaged(stagingPath);
                return { status: "duplicate", key };
            }
            logErrorWithContext(log, "Failed to write pending sidecar", wrapNodeError(err, sidecarPath), {
                key,
            });
            sidecarWritten = false;
        }

        let imagePlaced = false;
        if (imageExtracted && sidecarWritten) {
            imagePlaced = await this.placeImage(stagingPath, imagePath, key);
        } else if (imageExtracted) {
            await this.discardStaged(stagingPath);
        }

        log.info(`Queued ${key} (${reason})`, { imageExtracted: imagePlaced });
        return { status: "queued", key, imageExtracted: imagePlaced, sidecarWritten };
    }

    private async placeImage(stagingPath: string, imagePath: string, key: string): Promise<boolean> {
        try {
            await fs.promises.rename(stagingPath, imagePath);
            return true;
        } catch (err) {
            logErrorWithContext(log, "Failed to move extracted cover into place", wrapNodeError(err, imagePath), {
                key,
            });
            await this.discardStaged(stagingPath);
            return false;
        }
    }

    private async discardStaged(stagingPath: string): Promise<void> {
        try {
            await fs.promises.rm(stagingPath, { force: true });
        } catch (error) {
            log.warn(`Failed to remove staged cover ${stagingPath}`, error);
        }
    }
}
