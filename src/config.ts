import dotenv from "dotenv";
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import ffmpegInstaller from "@ffmpeg-installer/ffmpeg";
import { BRAND_USER_AGENT } from "./config/brand";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { parseEnvInt, parseEnvString } from "./utils/envParsers";
import { logger } from "./utils/logger";

dotenv.config();

const SYSTEM_FFMPEG_PATH = "/usr/bin/ffmpeg";
const DEFAULT_MUSICBRAINZ_BASE_URL = "https://musicbrainz.org/ws/2";
const DEFAULT_COVER_ART_ARCHIVE_HOST = "coverartarchive.org";
const DEFAULT_EXTRACTION_CONCURRENCY = 2;

const absolutePath = (name: string) =>
    z
        .string({ required_error: `${name} is required` })
        .trim()
        .min(1, `${name} is required`)
        .refine((value) => path.isAbsolute(value), {
            message: `${name} must be an absolute path`,
        });

const envSchema = z.object({
    MUSIC_ROOT: absolutePath("MUSIC_ROOT"),
    PENDING_COVERS_DIR: absolutePath("PENDING_COVERS_DIR"),
    MUSICBRAINZ_BASE_URL: z.string().url().optional(),
    COVER_ART_ARCHIVE_HOST: z
        .string()
        .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, "COVER_ART_ARCHIVE_HOST must be a bare host name")
        .optional(),
    FFMPEG_PATH: z.string().optional(),
    EXTRACTION_CONCURRENCY: z.string().regex(/^\d*$/).optional(),
    HTTP_TIMEOUT_MS: z.string().regex(/^\d*$/).optional(),
});

/** Everything the resolver pipeline needs, read once at startup and passed in explicitly. */
export interface TrackArtConfig {
    musicRoot: string;
    pendingCoversDir: string;
    musicBrainzBaseUrl: string;
    coverArtArchiveHost: string;
    userAgent: string;
    ffmpegPath: string;
    extractionConcurrency: number;
    /** 0 disables the timeout, matching axios' default. */
    httpTimeoutMs: number;
}

/**
 * FFMPEG_PATH wins, then a system install, then the binary bundled through npm.
 */
export function resolveFfmpegBinaryPath(configured: string | undefined): string {
    const explicit = parseEnvString(configured);
    if (explicit) {
        return explicit;
    }
    if (fs.existsSync(SYSTEM_FFMPEG_PATH)) {
        return SYSTEM_FFMPEG_PATH;
    }
    return ffmpegInstaller.path;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackArtConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (err) => `${err.path.join(".")}: ${err.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Environment validation failed:\n   - ${issues.join("\n   - ")}`,
            { issues }
        );
    }

    const vars = parsed.data;
    const extractionConcurrency = Math.max(
        1,
        parseEnvInt(vars.EXTRACTION_CONCURRENCY, DEFAULT_EXTRACTION_CONCURRENCY)
    );

    const loaded: TrackArtConfig = {
        musicRoot: vars.MUSIC_ROOT,
        pendingCoversDir: vars.PENDING_COVERS_DIR,
        musicBrainzBaseUrl: (vars.MUSICBRAINZ_BASE_URL ?? DEFAULT_MUSICBRAINZ_BASE_URL).replace(/\/+$/, ""),
        coverArtArchiveHost: vars.COVER_ART_ARCHIVE_HOST ?? DEFAULT_COVER_ART_ARCHIVE_HOST,
        userAgent: BRAND_USER_AGENT,
        ffmpegPath: resolveFfmpegBinaryPath(vars.FFMPEG_PATH),
        extractionConcurrency,
        httpTimeoutMs: parseEnvInt(vars.HTTP_TIMEOUT_MS, 0),
    };

    logger.debug("Configuration loaded", {
        musicRoot: loaded.musicRoot,
        pendingCoversDir: loaded.pendingCoversDir,
        ffmpegPath: loaded.ffmpegPath,
    });

    return Object.freeze(loaded);
}
