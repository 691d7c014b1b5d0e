import path from "node:path";
import { YT_DLP_PROGRESS_PREFIX } from "./progress-parser.js";
import type {
	DownloaderOptions,
	DownloadRequest,
	FormatSelection,
	PostProcessStep,
} from "./types.js";

export const MP3_QUALITY_KBPS = "192";

const FORMAT_SELECTORS: Record<FormatSelection, string | undefined> = {
	mp3: "bestaudio/best",
	mp4: "bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best",
	webm: "bestvideo[ext=webm]+bestaudio[ext=webm]/best[ext=webm]/best",
	best: undefined,
};

export function buildDownloaderOptions(
	request: DownloadRequest,
): DownloaderOptions {
	const postprocessors: PostProcessStep[] = [];

	if (request.format === "mp3") {
		postprocessors.push({
			key: "FFmpegExtractAudio",
			preferredCodec: "mp3",
			preferredQuality: MP3_QUALITY_KBPS,
		});
	}

	// Audio extraction must run before thumbnail conversion.
	if (request.withThumbnail) {
		postprocessors.push({ key: "FFmpegThumbnailsConvertor", format: "jpg" });
	}

	return {
		outputTemplate: path.join(request.outputDir, "%(title)s.%(ext)s"),
		format: FORMAT_SELECTORS[request.format],
		postprocessors,
		writeSubtitles: request.withSubtitles,
		writeAutomaticSubtitles: request.withSubtitles,
		writeThumbnail: request.withThumbnail,
		quiet: true,
	};
}

export type YtDlpArgOptions = {
	ffmpegPath?: string;
	verbose?: boolean;
};

export function toYtDlpArgs(
	options: DownloaderOptions,
	url: string,
	extra: YtDlpArgOptions = {},
): string[] {
	const args = [
		"--newline",
		"--progress",
		"--progress-template",
		`download:${YT_DLP_PROGRESS_PREFIX} %(progress.status)s|%(progress._percent_str)s|%(progress._speed_str)s|%(progress._eta_str)s|%(progress.filename)s`,
		"-o",
		options.outputTemplate,
	];

	if (options.format) {
		args.push("-f", options.format);
	}

	if (options.writeSubtitles) {
		args.push("--write-subs");
	}

	if (options.writeAutomaticSubtitles) {
		args.push("--write-auto-subs");
	}

	if (options.writeThumbnail) {
		args.push("--write-thumbnail");
	}

	for (const step of options.postprocessors) {
		switch (step.key) {
			case "FFmpegExtractAudio":
				args.push(
					"-x",
					"--audio-format",
					step.preferredCodec,
					"--audio-quality",
					`${step.preferredQuality}K`,
				);
				break;
			case "FFmpegThumbnailsConvertor":
				args.push("--convert-thumbnails", step.format);
				break;
		}
	}

	if (extra.ffmpegPath) {
		args.push("--ffmpeg-location", extra.ffmpegPath);
	}

	if (extra.verbose) {
		args.push("--verbose");
	}

	args.push("--", url);
	return args;
}
