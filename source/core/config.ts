import { homedir } from "node:os";
import path from "node:path";
import { InvalidInputError } from "./errors.js";
import { FORMAT_SELECTIONS, type FormatSelection } from "./types.js";

export type CliFlags = {
	format?: string;
	output?: string;
	subtitles: boolean;
	thumbnail: boolean;
	convertMp4: boolean;
	ytDlp?: string;
	ffmpeg?: string;
	ffprobe?: string;
	settleMs?: number;
	progress: boolean;
	json: boolean;
	verbose: boolean;
};

export type ToolPaths = {
	ytDlpPath: string;
	ffmpegPath: string;
	ffprobePath: string;
	/** Only set when ffmpeg was configured explicitly; handed to yt-dlp. */
	ffmpegLocation?: string;
};

export type AppConfig = {
	format: FormatSelection;
	outputDir: string;
	withSubtitles: boolean;
	withThumbnail: boolean;
	convertToMp4: boolean;
	tools: ToolPaths;
	settleMs: number;
	progress: boolean;
	json: boolean;
	verbose: boolean;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_SETTLE_MS = 2000;

export function isFormatSelection(value: string): value is FormatSelection {
	return FORMAT_SELECTIONS.some((format) => format === value);
}

export function parseFormat(value: string): FormatSelection {
	const normalized = value.trim().toLowerCase();
	if (!isFormatSelection(normalized)) {
		throw new InvalidInputError(
			`Unknown format "${value}". Choose one of: ${FORMAT_SELECTIONS.join(", ")}`,
		);
	}
	return normalized;
}

export function defaultOutputDir(home: string = homedir()): string {
	return path.join(home, "Downloads", "clipdrop");
}

export function resolveConfig(
	flags: CliFlags,
	env: Env = process.env,
	home: string = homedir(),
): AppConfig {
	const ffmpegOverride = nonEmpty(flags.ffmpeg) ?? nonEmpty(env.CLIPDROP_FFMPEG_PATH);

	return {
		format: parseFormat(flags.format ?? "best"),
		outputDir:
			nonEmpty(flags.output) ??
			nonEmpty(env.CLIPDROP_OUTPUT_DIR) ??
			defaultOutputDir(home),
		withSubtitles: flags.subtitles,
		withThumbnail: flags.thumbnail,
		convertToMp4: flags.convertMp4,
		tools: {
			ytDlpPath:
				nonEmpty(flags.ytDlp) ?? nonEmpty(env.CLIPDROP_YT_DLP_PATH) ?? "yt-dlp",
			ffmpegPath: ffmpegOverride ?? "ffmpeg",
			ffprobePath:
				nonEmpty(flags.ffprobe) ??
				nonEmpty(env.CLIPDROP_FFPROBE_PATH) ??
				"ffprobe",
			ffmpegLocation: ffmpegOverride,
		},
		settleMs: parseSettleMs(flags.settleMs, env.CLIPDROP_SETTLE_MS),
		progress: flags.progress,
		json: flags.json,
		verbose: flags.verbose,
	};
}

function parseSettleMs(flag: number | undefined, envValue?: string): number {
	const raw = flag ?? (nonEmpty(envValue) ? Number(envValue) : undefined);
	if (raw === undefined) {
		return DEFAULT_SETTLE_MS;
	}

	if (!Number.isFinite(raw) || raw < 0) {
		throw new InvalidInputError(
			`Settle window must be a non-negative number of milliseconds, got ${String(flag ?? envValue)}`,
		);
	}
	return Math.floor(raw);
}

function nonEmpty(value?: string): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}
