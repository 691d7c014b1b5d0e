import { type ChildProcess, spawn } from "node:child_process";
import { EventEmitter, once } from "node:events";
import { PassThrough } from "node:stream";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { DownloadError } from "../source/core/errors.js";
import { buildDownloaderOptions } from "../source/core/options.js";
import type {
	DownloaderHooks,
	DownloaderLogLevel,
	ProgressPayload,
} from "../source/core/types.js";
import { YtDlpDownloader } from "../source/tools/yt-dlp.js";

vi.mock("node:child_process", () => ({
	spawn: vi.fn(),
}));

class FakeChild extends EventEmitter {
	readonly stdout = new PassThrough();
	readonly stderr = new PassThrough();
	readonly kill = vi.fn(() => true);

	async finish(code: number): Promise<void> {
		const ended = Promise.all([
			once(this.stdout, "end"),
			once(this.stderr, "end"),
		]);
		this.stdout.end();
		this.stderr.end();
		await ended;
		this.emit("close", code);
	}
}

function recordingHooks(): {
	hooks: DownloaderHooks;
	progress: ProgressPayload[];
	logs: Array<[DownloaderLogLevel, string]>;
} {
	const progress: ProgressPayload[] = [];
	const logs: Array<[DownloaderLogLevel, string]> = [];
	return {
		progress,
		logs,
		hooks: {
			onProgress: (payload) => progress.push(payload),
			onLog: (level, message) => logs.push([level, message]),
		},
	};
}

const options = buildDownloaderOptions({
	url: "https://example.com/video",
	outputDir: "/tmp/out",
	format: "best",
	withSubtitles: false,
	withThumbnail: false,
	convertToMp4: true,
});

describe("YtDlpDownloader", () => {
	let child: FakeChild;

	beforeEach(() => {
		child = new FakeChild();
		vi.mocked(spawn).mockReset();
		vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
	});

	it("spawns yt-dlp with the built arguments", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "/usr/bin/yt-dlp" });

		const pending = downloader.download(
			"https://example.com/video",
			options,
			recordingHooks().hooks,
		);
		await child.finish(0);
		await pending;

		const call = vi.mocked(spawn).mock.calls[0];
		expect(call?.[0]).toBe("/usr/bin/yt-dlp");
		expect(call?.[1]?.slice(-2)).toEqual(["--", "https://example.com/video"]);
	});

	it("routes progress and log lines and returns the merged file", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "yt-dlp" });
		const { hooks, progress, logs } = recordingHooks();

		const pending = downloader.download(
			"https://example.com/video",
			options,
			hooks,
		);
		child.stdout.write("[generic] video: Downloading webpage\n");
		child.stdout.write(
			"[clipdrop-progress] downloading| 12.5%|1.00MiB/s|00:30|/tmp/out/clip.f303.webm\n",
		);
		child.stdout.write(
			"[clipdrop-progress] finished|100.0%|NA|NA|/tmp/out/clip.f303.webm\n",
		);
		child.stderr.write("WARNING: falling back to generic extractor\n");
		child.stdout.write('[Merger] Merging formats into "/tmp/out/clip.webm"\n');
		await child.finish(0);

		await expect(pending).resolves.toEqual({ filePath: "/tmp/out/clip.webm" });
		expect(progress).toEqual([
			{
				status: "downloading",
				percent: " 12.5%",
				speed: "1.00MiB/s",
				eta: "00:30",
				filename: "/tmp/out/clip.f303.webm",
			},
			{
				status: "finished",
				percent: "100.0%",
				speed: "NA",
				eta: "NA",
				filename: "/tmp/out/clip.f303.webm",
			},
		]);
		expect(logs.filter(([level]) => level === "info")).toEqual([
			["info", "[generic] video: Downloading webpage"],
			["info", '[Merger] Merging formats into "/tmp/out/clip.webm"'],
		]);
		expect(logs).toContainEqual([
			"warning",
			"falling back to generic extractor",
		]);
		expect(logs).toHaveLength(3);
	});

	it("returns the extracted audio file for mp3 downloads", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "yt-dlp" });
		const { hooks, logs } = recordingHooks();

		const pending = downloader.download(
			"https://example.com/video",
			options,
			hooks,
		);
		child.stdout.write(
			"[clipdrop-progress] finished|100.0%|NA|NA|/tmp/out/Song.webm\n",
		);
		child.stdout.write("[ExtractAudio] Destination: /tmp/out/Song.mp3\n");
		await child.finish(0);

		await expect(pending).resolves.toEqual({ filePath: "/tmp/out/Song.mp3" });
		expect(logs).toEqual([
			["info", "[ExtractAudio] Destination: /tmp/out/Song.mp3"],
		]);
	});

	it("stops yt-dlp when a hook throws", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "yt-dlp" });
		const hooks: DownloaderHooks = {
			onProgress: () => {},
			onLog: () => {
				throw new Error("hook broke");
			},
		};

		const pending = downloader.download(
			"https://example.com/video",
			options,
			hooks,
		);
		child.stdout.write("[generic] video: Downloading webpage\n");

		await expect(pending).rejects.toThrow("hook broke");
		expect(child.kill).toHaveBeenCalledTimes(1);
		await child.finish(0);
	});

	it("fails with the last error line when yt-dlp exits non-zero", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "yt-dlp" });
		const { hooks, logs } = recordingHooks();

		const pending = downloader.download(
			"https://example.com/video",
			options,
			hooks,
		);
		child.stderr.write(
			"ERROR: Unsupported URL: https://example.com/video\n",
		);
		await child.finish(1);

		await expect(pending).rejects.toBeInstanceOf(DownloadError);
		await expect(pending).rejects.toThrow(
			"ERROR: Unsupported URL: https://example.com/video",
		);
		expect(logs).toEqual([
			["error", "Unsupported URL: https://example.com/video"],
		]);
	});

	it("names the exit code when stderr is empty", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "yt-dlp" });

		const pending = downloader.download(
			"https://example.com/video",
			options,
			recordingHooks().hooks,
		);
		await child.finish(2);

		await expect(pending).rejects.toThrow("yt-dlp failed with exit code 2");
	});

	it("fails when the process cannot start", async () => {
		const downloader = new YtDlpDownloader({ ytDlpPath: "yt-dlp" });

		const pending = downloader.download(
			"https://example.com/video",
			options,
			recordingHooks().hooks,
		);
		child.emit("error", new Error("spawn yt-dlp ENOENT"));

		await expect(pending).rejects.toThrow("spawn yt-dlp ENOENT");
	});
});
