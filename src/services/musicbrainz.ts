import axios, { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { describeHttpFailure } from "../utils/http";
import { createLogger } from "../utils/logger";

const log = createLogger("MusicBrainz");

const releaseSchema = z.object({
    id: z.string().min(1),
    "release-group": z.object({ id: z.string().min(1) }),
    "cover-art-archive": z.object({ front: z.boolean() }),
});

const releaseGroupSearchSchema = z.object({
    "release-groups": z.array(z.object({ id: z.string().min(1) })),
});

export type MusicBrainzRelease = z.infer<typeof releaseSchema>;
export type MusicBrainzReleaseGroup = z.infer<
    typeof releaseGroupSearchSchema
>["release-groups"][number];

export interface MusicBrainzServiceOptions {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
}

/** The two MusicBrainz calls the record resolver depends on. */
export interface MetadataLookup {
    getRelease(releaseMbid: string): Promise<MusicBrainzRelease | null>;
    searchReleaseGroups(
        artist: string,
        album: string,
        limit?: number
    ): Promise<MusicBrainzReleaseGroup[] | null>;
}

export class MusicBrainzService implements MetadataLookup {
    private client: AxiosInstance;

    constructor(options: MusicBrainzServiceOptions) {
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers: {
                "User-Agent": options.userAgent,
                Accept: "application/json",
            },
        });
    }

    /**
     * Looks up a release with its parent release group.
     * Unreachable service, non-200 status and malformed payloads all yield null.
     */
    async getRelease(releaseMbid: string): Promise<MusicBrainzRelease | null> {
        const response = await this.request(`/release/${releaseMbid}`, {
            inc: "release-groups",
        });
        if (!response) {
            return null;
        }

        const parsed = releaseSchema.safeParse(response.data);
        if (!parsed.success) {
            log.warn(`Release ${releaseMbid} response did not match the expected shape`, {
                issues: parsed.error.issues.map((issue) => issue.path.join(".")),
            });
            return null;
        }
        return parsed.data;
    }

    /**
     * Structured release-group search. Transport failures and non-200
     * statuses yield null; a 200 with an unexpected body means the service
     * contract changed and is raised as a recoverable AppError.
     */
    async searchReleaseGroups(
        artist: string,
        album: string,
        limit = 1
    ): Promise<MusicBrainzReleaseGroup[] | null> {
        const query = `artist:${artist} AND release:${album}`;
        const response = await this.request("/release-group/", { query, limit });
        if (!response) {
            return null;
        }

        const parsed = releaseGroupSearchSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new AppError(
                ErrorCode.MALFORMED_SEARCH_RESPONSE,
                ErrorCategory.RECOVERABLE,
                "Received release-group search response from MusicBrainz in unexpected format",
                {
                    query,
                    issues: parsed.error.issues.map((issue) => ({
                        path: issue.path.join("."),
                        message: issue.message,
                    })),
                }
            );
        }
        return parsed.data["release-groups"];
    }

    private async request(
        path: string,
        params: Record<string, string | number>
    ): Promise<AxiosResponse<unknown> | null> {
        let response: AxiosResponse<unknown>;
        try {
            response = await this.client.get<unknown>(path, { params });
        } catch (error) {
            log.warn(`Request ${path} failed: ${describeHttpFailure(error)}`);
            return null;
        }

        if (response.status !== 200) {
            log.warn(`Request ${path} returned HTTP ${response.status}`);
            return null;
        }
        return response;
    }
}
