import { spawn } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { fileExists } from "../utils/fileSystem";
import { createLogger } from "../utils/logger";

const log = createLogger("CoverArtExtractor");

const EXTRACTION_TIMEOUT_MS = 30_000;

/** Anything that can pull an embedded picture out of an audio file. */
export interface EmbeddedCoverExtractor {
    extract(audioFilePath: string, destinationPath: string): Promise<boolean>;
}

/**
 * Copies the attached-picture stream of an audio file into an image file
 * with ffmpeg, dropping the audio and without re-encoding.
 */
export class CoverArtExtractor implements EmbeddedCoverExtractor {
    constructor(private readonly ffmpegPath: string) {}

    /**
     * Best effort. Returns true only when ffmpeg exits cleanly and the image
     * exists; otherwise any partial output is removed and false is returned.
     */
    async extract(audioFilePath: string, destinationPath: string): Promise<boolean> {
        let exitCode: number | null = null;
        try {
            exitCode = await this.runFfmpeg([
                "-y",
                "-i",
                audioFilePath,
                "-an",
                "-vcodec",
                "copy",
                destinationPath,
            ]);
        } catch (error) {
            log.warn(`ffmpeg could not run for ${path.basename(audioFilePath)}`, error);
        }

        if (exitCode === 0 && (await fileExists(destinationPath))) {
            log.debug(
                `Extracted embedded cover from ${path.basename(audioFilePath)}: ${path.basename(destinationPath)}`
            );
            return true;
        }

        try {
            await fs.promises.rm(destinationPath, { force: true });
        } catch (error) {
            log.warn(`Failed to remove partial cover ${destinationPath}`, error);
        }
        return false;
    }

    private runFfmpeg(args: string[]): Promise<number | null> {
        return new Promise<number | null>((resolve, reject) => {
            const ffmpegProc = spawn(this.ffmpegPath, args, {
                stdio: ["ignore", "ignore", "ignore"],
            });

            const timeoutId = setTimeout(() => {
                ffmpegProc.kill("SIGKILL");
                reject(new Error(`ffmpeg timed out after ${EXTRACTION_TIMEOUT_MS}ms`));
            }, EXTRACTION_TIMEOUT_MS);

            ffmpegProc.on("error", (error) => {
                clearTimeout(timeoutId);
                reject(error);
            });

            ffmpegProc.on("close", (code) => {
                clearTimeout(timeoutId);
                resolve(code);
            });
        });
    }
}
