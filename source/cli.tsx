#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import { render } from "ink";
import meow from "meow";
import App from "./app.js";
import { ChannelEmitter } from "./core/channel.js";
import { type AppConfig, parseFormat, resolveConfig } from "./core/config.js";
import { describeError, InvalidInputError, toExitCode } from "./core/errors.js";
import { DownloadOrchestrator } from "./core/orchestrator.js";
import { checkDependencies } from "./core/preflight.js";
import { COMPLETE_STATUS, statusForProgress } from "./core/status.js";
import {
	type DownloadRequest,
	FORMAT_SELECTIONS,
	type FormatSelection,
} from "./core/types.js";
import { FfmpegTranscoder } from "./tools/ffmpeg.js";
import { YtDlpDownloader } from "./tools/yt-dlp.js";
import { ensureOutputDir } from "./utils/fs.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { parseHttpUrl } from "./utils/url-detect.js";

const cli = meow(
	`
	Usage
	  $ clipdrop [url] [options]

	Options
	  --format <value>     mp4|mp3|webm|best (default: best)
	  --output <dir>       Output directory (default: ~/Downloads/clipdrop)
	  --subtitles          Download manual and automatic subtitles
	  --thumbnail          Download the thumbnail as jpg
	  --convert-mp4        Re-encode "best" downloads to mp4 with ffmpeg
	  --yt-dlp <path>      yt-dlp executable (default: yt-dlp on PATH)
	  --ffmpeg <path>      ffmpeg executable (default: ffmpeg on PATH)
	  --ffprobe <path>     ffprobe executable (default: ffprobe on PATH)
	  --settle-ms <ms>     Wait for the downloaded file to settle before converting (default: 2000)
	  --no-progress        Disable the live view
	  --json               Emit JSON events
	  --verbose            Verbose logs

	Environment
	  CLIPDROP_OUTPUT_DIR, CLIPDROP_YT_DLP_PATH, CLIPDROP_FFMPEG_PATH,
	  CLIPDROP_FFPROBE_PATH, CLIPDROP_SETTLE_MS

	Examples
	  $ clipdrop "https://example.com/watch?v=abc123" --format mp3
	  $ clipdrop "https://example.com/clip/42" --convert-mp4 --output ./videos
	`,
	{
		importMeta: import.meta,
		flags: {
			format: {
				type: "string",
			},
			output: {
				type: "string",
			},
			subtitles: {
				type: "boolean",
				default: false,
			},
			thumbnail: {
				type: "boolean",
				default: false,
			},
			convertMp4: {
				type: "boolean",
				default: false,
			},
			ytDlp: {
				type: "string",
			},
			ffmpeg: {
				type: "string",
			},
			ffprobe: {
				type: "string",
			},
			settleMs: {
				type: "number",
			},
			progress: {
				type: "boolean",
				default: true,
			},
			json: {
				type: "boolean",
				default: false,
			},
			verbose: {
				type: "boolean",
				default: false,
			},
		},
	},
);

const logger = createLogger({ verbose: cli.flags.verbose });

try {
	await main();
} catch (error) {
	logger.error(describeError(error));
	process.exitCode = toExitCode(error);
}

async function main(): Promise<void> {
	const config = resolveConfig(cli.flags);
	if (!config.json) {
		printStartupBanner(await getCliVersion());
	}

	if (cli.input.length > 1) {
		throw new InvalidInputError(
			"Expected at most one URL argument: clipdrop [url] [options]",
		);
	}

	await checkDependencies(config.tools);

	const request = await resolveRequestFromInput(config);
	const orchestrator = createOrchestrator(config, logger);

	if (config.json || !config.progress || !process.stdout.isTTY) {
		const channel = new ChannelEmitter();
		attachHeadlessOutput(channel, config.json);
		const handle = orchestrator.submit(request, channel.asChannel());
		const outcome = await handle.outcome;
		if (outcome.status === "failure") {
			process.exitCode = 1;
		} else if (outcome.filePath && !config.json) {
			logger.info(`Saved to ${outcome.filePath}`);
		}
		return;
	}

	console.clear();
	const ui = render(<App orchestrator={orchestrator} request={request} />);
	await ui.waitUntilExit();
}

function createOrchestrator(
	config: AppConfig,
	log: Logger,
): DownloadOrchestrator {
	return new DownloadOrchestrator({
		downloader: new YtDlpDownloader({
			ytDlpPath: config.tools.ytDlpPath,
			ffmpegLocation: config.tools.ffmpegLocation,
			verbose: config.verbose,
			logger: log,
		}),
		transcoder: new FfmpegTranscoder({
			ffmpegPath: config.tools.ffmpegPath,
			ffprobePath: config.tools.ffprobePath,
			settle: {
				timeoutMs: config.settleMs,
				intervalMs: Math.min(250, Math.max(1, config.settleMs)),
			},
			logger: log,
		}),
		logger: log,
	});
}

async function getCliVersion(): Promise<string> {
	const { npm_package_version: envVersion } = process.env;
	if (envVersion) {
		return envVersion;
	}

	try {
		const packageJsonPath = new URL("../package.json", import.meta.url);
		const raw = await readFile(packageJsonPath, "utf8");
		const parsed = JSON.parse(raw) as { version?: string };
		return parsed.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

function printStartupBanner(version: string): void {
	const bannerLines = String.raw`
      _ _           _
  ___| (_)_ __   __| |_ __ ___  _ __
 / __| | | '_ \ / _' | '__/ _ \| '_ \
| (__| | | |_) | (_| | | | (_) | |_) |
 \___|_|_| .__/ \__,_|_|  \___/| .__/
         |_|                   |_|
`
		.trim()
		.split("\n");

	const gradient = [
		[0, 170, 255],
		[40, 190, 255],
		[80, 205, 255],
		[120, 220, 255],
		[160, 232, 255],
		[200, 242, 255],
	] as const;
	const fallbackColor: readonly [number, number, number] = [200, 242, 255];

	for (const [index, line] of bannerLines.entries()) {
		const [r, g, b] = gradient[index] ?? fallbackColor;
		console.error(chalk.rgb(r, g, b).bold(line));
	}

	console.error(chalk.rgb(80, 205, 255)(`clipdrop v${version}`));
	console.error(
		chalk.rgb(145, 170, 205)("Paste a link, pick a format, get the file."),
	);
	console.error("");
}

async function resolveRequestFromInput(
	config: AppConfig,
): Promise<DownloadRequest> {
	if (cli.input.length === 1) {
		const inputUrl = cli.input[0];
		if (!inputUrl) {
			throw new InvalidInputError("Missing URL argument");
		}

		const parsedUrl = parseHttpUrl(inputUrl);
		return {
			url: parsedUrl.toString(),
			outputDir: await ensureOutputDir(config.outputDir),
			format: config.format,
			withSubtitles: config.withSubtitles,
			withThumbnail: config.withThumbnail,
			convertToMp4: config.format === "best" && config.convertToMp4,
		};
	}

	if (!process.stdin.isTTY || config.json) {
		throw new InvalidInputError(
			"URL is required in non-interactive mode: clipdrop <url> [options]",
		);
	}

	return promptInteractiveRequest(config);
}

async function promptInteractiveRequest(
	defaults: AppConfig,
): Promise<DownloadRequest> {
	const rl = createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	try {
		console.log("clipdrop interactive setup");
		console.log("");

		const parsedUrl = parseHttpUrl(await askRequired(rl, "Video URL"));
		const format = await askFormat(rl, defaults.format);
		const output = await askWithDefault(
			rl,
			"Save to",
			defaults.outputDir,
		);
		const withSubtitles = await askYesNo(
			rl,
			"Download subtitles",
			defaults.withSubtitles,
		);
		const withThumbnail = await askYesNo(
			rl,
			"Download thumbnail",
			defaults.withThumbnail,
		);
		const convertToMp4 =
			format === "best"
				? await askYesNo(rl, "Convert to mp4", defaults.convertToMp4)
				: false;

		return {
			url: parsedUrl.toString(),
			outputDir: await ensureOutputDir(output),
			format,
			withSubtitles,
			withThumbnail,
			convertToMp4,
		};
	} finally {
		rl.close();
	}
}

type Prompt = ReturnType<typeof createInterface>;

async function askWithDefault(
	rl: Prompt,
	label: string,
	defaultValue: string,
): Promise<string> {
	const answer = await rl.question(
		`${label}${defaultValue ? ` [${defaultValue}]` : ""}: `,
	);
	const trimmed = answer.trim();
	return trimmed || defaultValue;
}

async function askRequired(rl: Prompt, label: string): Promise<string> {
	for (;;) {
		const value = await askWithDefault(rl, label, "");
		if (value) {
			return value;
		}
		console.log("Please enter a URL");
	}
}

async function askFormat(
	rl: Prompt,
	defaultValue: FormatSelection,
): Promise<FormatSelection> {
	for (;;) {
		const value = await askWithDefault(
			rl,
			`Format (${FORMAT_SELECTIONS.join(", ")})`,
			defaultValue,
		);
		try {
			return parseFormat(value);
		} catch (error) {
			console.log(describeError(error));
		}
	}
}

async function askYesNo(
	rl: Prompt,
	label: string,
	defaultValue: boolean,
): Promise<boolean> {
	const answer = await askWithDefault(
		rl,
		`${label} (y/n)`,
		defaultValue ? "y" : "n",
	);
	return answer.toLowerCase().startsWith("y");
}

function attachHeadlessOutput(channel: ChannelEmitter, asJson: boolean): void {
	if (asJson) {
		const out = (event: string, payload: object) => {
			console.log(JSON.stringify({ event, ...payload }));
		};
		channel.on("log", (payload) => out("log", payload));
		channel.on("progress", ({ event }) => out("progress", event));
		channel.on("complete", () => out("complete", {}));
		channel.on("failed", (payload) => out("failed", payload));
		return;
	}

	channel.on("log", ({ message }) => console.log(message));
	channel.on("progress", ({ event }) => {
		const status = statusForProgress(event);
		if (status) {
			console.log(status);
		}
	});
	channel.on("complete", () => console.log(COMPLETE_STATUS));
	channel.on("failed", ({ message }) => console.log(`Error: ${message}`));
}
