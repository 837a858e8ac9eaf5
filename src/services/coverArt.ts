import axios, { AxiosInstance } from "axios";
import { describeHttpFailure } from "../utils/http";
import { createLogger } from "../utils/logger";
import { recordKindPath, type ResolvedRecord } from "./types";

const log = createLogger("CoverArt");

/** Fixed thumbnail variant; the player only needs a small image. */
const COVER_SIZE_SUFFIX = "front-250";

export interface CoverArtServiceOptions {
    archiveHost: string;
    userAgent: string;
    timeoutMs: number;
}

export interface CoverProbeResult {
    url: string;
    exists: boolean;
}

export function buildCoverUrl(archiveHost: string, record: ResolvedRecord): string {
    return `https://${archiveHost}/${recordKindPath(record.kind)}/${record.id}/${COVER_SIZE_SUFFIX}`;
}

/**
 * Confirms that the Cover Art Archive actually serves a front image for a
 * record. A network failure and a confirmed 404 both mean "no art".
 */
export class CoverArtService {
    private client: AxiosInstance;

    constructor(private readonly options: CoverArtServiceOptions) {
        this.client = axios.create({
            timeout: options.timeoutMs,
            headers: {
                "User-Agent": options.userAgent,
            },
        });
    }

    coverUrl(record: ResolvedRecord): string {
        return buildCoverUrl(this.options.archiveHost, record);
    }

    async probe(record: ResolvedRecord): Promise<CoverProbeResult> {
        const url = this.coverUrl(record);

        try {
            const response = await this.client.head(url);
            const exists = response.status >= 200 && response.status < 300;
            return { url, exists };
        } catch (error) {
            log.debug(`No cover at ${url}: ${describeHttpFailure(error)}`);
            return { url, exists: false };
        }
    }
}
