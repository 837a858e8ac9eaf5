import { promises as fsPromises } from "fs";
import os from "os";
import path from "path";
import { deriveQueueKey, PendingQueue, type QueueOutcome } from "../pendingQueue";
import type { TrackMetadata } from "../types";
import { ErrorCode } from "../../utils/errors";

const mockLogErrorWithContext = jest.fn();

jest.mock("../../utils/logger", () => ({
    createLogger: () => ({
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    }),
    logErrorWithContext: (...args: unknown[]) => mockLogErrorWithContext(...args),
}));

const FIXED_NOW = new Date("2026-03-14T09:26:53.000Z");

const track: TrackMetadata = {
    artist: "Sigur Rós",
    albumArtist: "Sigur Rós",
    album: "Ágætis byrjun",
    title: "Svefn-g-englar",
    trackNumber: "2",
    date: "1999-06-12",
    durationSecs: 604.73,
    relativePath: "Sigur Ros/Agaetis byrjun/02 Svefn-g-englar.flac",
};

describe("deriveQueueKey", () => {
    it("uses the MBID verbatim when one is given", () => {
        expect(deriveQueueKey(track, "1b022e01-4da6-387b-8658-8678046e4cef")).toBe(
            "1b022e01-4da6-387b-8658-8678046e4cef"
        );
    });

    it("builds a sanitized artist/title key otherwise", () => {
        expect(deriveQueueKey(track, null)).toBe("nombid_Sigur_Rs_Svefn_g_englar");
    });

    it("uses the track artist rather than the album artist", () => {
        expect(
            deriveQueueKey({ ...track, artist: "Guest", albumArtist: "Various Artists" }, null)
        ).toBe("nombid_Guest_Svefn_g_englar");
    });

    it("substitutes unknown for missing or fully stripped tags", () => {
        expect(deriveQueueKey({ relativePath: "x.mp3", title: "???" }, null)).toBe(
            "nombid_unknown_unknown"
        );
    });
});

describe("PendingQueue", () => {
    let workDir: string;
    let pendingDir: string;
    let extract: jest.Mock<Promise<boolean>, [string, string]>;

    const createQueue = (dir = pendingDir) =>
        new PendingQueue({
            pendingDir: dir,
            musicRoot: "/mnt/music",
            extractor: { extract },
            extractionConcurrency: 2,
            now: () => FIXED_NOW,
        });

    const readSidecar = async (key: string): Promise<unknown> =>
        JSON.parse(await fsPromises.readFile(path.join(pendingDir, `${key}.json`), "utf8"));

    beforeEach(async () => {
        workDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "trackart-pending-"));
        pendingDir = path.join(workDir, "pending_covers");
        extract = jest.fn(async (_audioPath: string, destinationPath: string) => {
            await fsPromises.writeFile(destinationPath, "jpeg-bytes");
            return true;
        });
    });

    afterEach(async () => {
        await fsPromises.rm(workDir, { recursive: true, force: true });
    });

    it("creates the directory, extracts embedded art and writes the sidecar", async () => {
        const outcome = await createQueue().enqueue(track, "rel-1", "missing_caa");

        expect(outcome).toEqual({
            status: "queued",
            key: "rel-1",
            imageExtracted: true,
            sidecarWritten: true,
        });
        const [sourcePath, stagingPath] = extract.mock.calls[0];
        expect(sourcePath).toBe("/mnt/music/Sigur Ros/Agaetis byrjun/02 Svefn-g-englar.flac");
        expect(path.dirname(stagingPath)).toBe(pendingDir);
        expect(path.basename(stagingPath)).toMatch(/^\.rel-1\.[0-9a-f-]{36}\.jpg$/);
        await expect(
            fsPromises.readFile(path.join(pendingDir, "rel-1.jpg"), "utf8")
        ).resolves.toBe("jpeg-bytes");
        expect((await fsPromises.readdir(pendingDir)).sort()).toEqual(["rel-1.jpg", "rel-1.json"]);
        await expect(readSidecar("rel-1")).resolves.toEqual({
            reason: "missing_caa",
            mbid: "rel-1",
            artist: "Sigur Rós",
            album: "Ágætis byrjun",
            title: "Svefn-g-englar",
            trackno: "2",
            date: "1999-06-12",
            duration_secs: 604,
            source_path: "/mnt/music/Sigur Ros/Agaetis byrjun/02 Svefn-g-englar.flac",
            added_at: "2026-03-14T09:26:53.000Z",
        });
    });

    it("pretty-prints the sidecar with two-space indentation", async () => {
        await createQueue().enqueue(track, "rel-1", "missing_caa");

        const raw = await fsPromises.readFile(path.join(pendingDir, "rel-1.json"), "utf8");
        expect(raw.split("\n")[1]).toBe('  "reason": "missing_caa",');
    });

    it("writes empty strings, a null MBID and zero duration for unknown fields", async () => {
        const bare: TrackMetadata = { artist: "Nobody", relativePath: "loose.mp3" };

        const outcome = await createQueue().enqueue(bare, null, "no_mb_match");

        expect(outcome).toMatchObject({ status: "queued", key: "nombid_Nobody_unknown" });
        await expect(readSidecar("nombid_Nobody_unknown")).resolves.toEqual({
            reason: "no_mb_match",
            mbid: null,
            artist: "Nobody",
            album: "",
            title: "",
            trackno: "",
            date: "",
            duration_secs: 0,
            source_path: "/mnt/music/loose.mp3",
            added_at: "2026-03-14T09:26:53.000Z",
        });
    });

    it("is a no-op the second time the same key is queued", async () => {
        const queue = createQueue();

        await queue.enqueue(track, null, "no_mb_match");
        const second = await queue.enqueue(track, null, "no_mb_match");

        expect(second).toEqual({ status: "duplicate", key: "nombid_Sigur_Rs_Svefn_g_englar" });
        expect(extract).toHaveBeenCalledTimes(1);
        expect((await fsPromises.readdir(pendingDir)).sort()).toEqual([
            "nombid_Sigur_Rs_Svefn_g_englar.jpg",
            "nombid_Sigur_Rs_Svefn_g_englar.json",
        ]);
    });

    it("treats an existing image alone as already queued", async () => {
        await fsPromises.mkdir(pendingDir, { recursive: true });
        await fsPromises.writeFile(path.join(pendingDir, "rel-5.jpg"), "from triage");

        const outcome = await createQueue().enqueue(track, "rel-5", "missing_caa");

        expect(outcome).toEqual({ status: "duplicate", key: "rel-5" });
        expect(extract).not.toHaveBeenCalled();
        expect((await fsPromises.readdir(pendingDir)).sort()).toEqual(["rel-5.jpg"]);
    });

    it("treats an existing sidecar alone as already queued", async () => {
        await fsPromises.mkdir(pendingDir, { recursive: true });
        await fsPromises.writeFile(path.join(pendingDir, "rel-6.json"), "{}");

        await expect(createQueue().enqueue(track, "rel-6", "missing_caa")).resolves.toEqual({
            status: "duplicate",
            key: "rel-6",
        });
        expect(extract).not.toHaveBeenCalled();
        await expect(readSidecar("rel-6")).resolves.toEqual({});
    });

    it("joins concurrent calls for the same key into one entry", async () => {
        const queue = createQueue();

        const outcomes = await Promise.all([
            queue.enqueue(track, "rel-7", "missing_caa"),
            queue.enqueue(track, "rel-7", "missing_caa"),
        ]);

        expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(["duplicate", "queued"]);
        expect(extract).toHaveBeenCalledTimes(1);
    });

    it("keeps the first writer's image when a second writer's extraction fails", async () => {
        let markSecondStarted: () => void = () => {};
        const secondStarted = new Promise<void>((resolve) => {
            markSecondStarted = resolve;
        });
        let firstOutcome: Promise<QueueOutcome> = Promise.resolve({ status: "duplicate", key: "" });

        const firstExtract = jest.fn(async (_audioPath: string, destinationPath: string) => {
            await secondStarted;
            await fsPromises.writeFile(destinationPath, "good-bytes");
            return true;
        });
        const secondExtract = jest.fn(async (_audioPath: string, destinationPath: string) => {
            markSecondStarted();
            await firstOutcome;
            await fsPromises.writeFile(destinationPath, "partial");
            await fsPromises.rm(destinationPath, { force: true });
            return false;
        });
        const queueFor = (extractFn: typeof firstExtract) =>
            new PendingQueue({
                pendingDir,
                musicRoot: "/mnt/music",
                extractor: { extract: extractFn },
                extractionConcurrency: 1,
                now: () => FIXED_NOW,
            });

        firstOutcome = queueFor(firstExtract).enqueue(track, "rel-10", "missing_caa");
        const secondOutcome = queueFor(secondExtract).enqueue(track, "rel-10", "missing_caa");

        await expect(firstOutcome).resolves.toEqual({
            status: "queued",
            key: "rel-10",
            imageExtracted: true,
            sidecarWritten: true,
        });
        await expect(secondOutcome).resolves.toEqual({ status: "duplicate", key: "rel-10" });
        expect(firstExtract.mock.calls[0][1]).not.toBe(secondExtract.mock.calls[0][1]);
        await expect(
            fsPromises.readFile(path.join(pendingDir, "rel-10.jpg"), "utf8")
        ).resolves.toBe("good-bytes");
        expect((await fsPromises.readdir(pendingDir)).sort()).toEqual(["rel-10.jpg", "rel-10.json"]);
    });

    it("still writes the sidecar when extraction fails", async () => {
        extract.mockResolvedValueOnce(false);

        const outcome = await createQueue().enqueue(track, "rel-8", "missing_caa");

        expect(outcome).toEqual({
            status: "queued",
            key: "rel-8",
            imageExtracted: false,
            sidecarWritten: true,
        });
        expect((await fsPromises.readdir(pendingDir)).sort()).toEqual(["rel-8.json"]);
    });

    it("abandons queuing when the directory cannot be created", async () => {
        const blocker = path.join(workDir, "not-a-dir");
        await fsPromises.writeFile(blocker, "file in the way");

        const outcome = await createQueue(path.join(blocker, "pending")).enqueue(
            track,
            "rel-9",
            "missing_caa"
        );

        expect(outcome.status).toBe("failed");
        if (outcome.status !== "failed") return;
        expect(outcome.error.code).toBe(ErrorCode.PENDING_QUEUE_UNAVAILABLE);
        expect(extract).not.toHaveBeenCalled();
        expect(mockLogErrorWithContext).toHaveBeenCalledWith(
            expect.anything(),
            "Pending queue unavailable",
            outcome.error
        );
    });
});
