#!/usr/bin/env node
import { createAlbumArtResolver, loadConfig } from "./index";
import { readTrackMetadata } from "./services/trackMetadata";
import { AppError } from "./utils/errors";
import { logger } from "./utils/logger";

export const EXIT_FOUND = 0;
export const EXIT_FAILED = 1;
export const EXIT_NOT_FOUND = 2;

/** `trackart <path-relative-to-music-root>`: prints the cover URL when one is confirmed. */
export async function main(
    argv: string[],
    write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Promise<number> {
    const relativePath = argv[0];
    if (!relativePath) {
        logger.error("Usage: trackart <path-relative-to-music-root>");
        return EXIT_FAILED;
    }

    try {
        const config = loadConfig();
        const track = await readTrackMetadata(config.musicRoot, relativePath);
        const url = await createAlbumArtResolver(config).getAlbumArtUrl(track);
        if (!url) {
            return EXIT_NOT_FOUND;
        }
        write(url);
        return EXIT_FOUND;
    } catch (error) {
        if (error instanceof AppError) {
            logger.error(error.message, error.toJSON());
            return EXIT_FAILED;
        }
        throw error;
    }
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.error("Unexpected failure", error);
            process.exitCode = EXIT_FAILED;
        });
}
