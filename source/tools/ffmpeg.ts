import { unlink } from "node:fs/promises";
import path from "node:path";
import type { LogEmitter, Transcoder } from "../core/collaborators.js";
import { describeError, TranscodeError } from "../core/errors.js";
import { type StabilityOptions, waitForStableFile } from "../utils/fs.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import {
	formatCommand,
	lastMeaningfulLines,
	type ProcessOutput,
	type ProcessRunner,
	runProcess,
} from "../utils/process.js";

export type FfmpegSettings = {
	ffmpegPath: string;
	ffprobePath: string;
	settle?: StabilityOptions;
	run?: ProcessRunner;
	logger?: Logger;
};

const DEFAULT_SETTLE: StabilityOptions = { timeoutMs: 2000, intervalMs: 250 };
const TARGET_EXTENSION = ".mp4";

export function buildProbeArgs(sourcePath: string): string[] {
	return [
		"-v",
		"error",
		"-select_streams",
		"v:0",
		"-show_entries",
		"stream=codec_type",
		"-of",
		"csv=p=0",
		sourcePath,
	];
}

export function buildTranscodeArgs(
	sourcePath: string,
	targetPath: string,
	hasVideo: boolean,
): string[] {
	if (hasVideo) {
		return [
			"-y",
			"-i",
			sourcePath,
			"-c:v",
			"libx264",
			"-preset",
			"ultrafast",
			"-c:a",
			"copy",
			targetPath,
		];
	}

	return ["-y", "-i", sourcePath, "-vn", "-c:a", "copy", targetPath];
}

export function toMp4Path(sourcePath: string): string {
	const { dir, name } = path.parse(sourcePath);
	return path.join(dir, `${name}${TARGET_EXTENSION}`);
}

export class FfmpegTranscoder implements Transcoder {
	readonly #settings: FfmpegSettings;
	readonly #run: ProcessRunner;
	readonly #logger: Logger;

	constructor(settings: FfmpegSettings) {
		this.#settings = settings;
		this.#run = settings.run ?? runProcess;
		this.#logger = settings.logger ?? silentLogger;
	}

	async maybeConvertToMp4(
		sourcePath: string,
		log: LogEmitter,
	): Promise<string> {
		const ready = await waitForStableFile(
			sourcePath,
			this.#settings.settle ?? DEFAULT_SETTLE,
		);
		if (!ready) {
			this.#logger.debug(`${sourcePath} did not settle; probing anyway`);
		}

		if (path.extname(sourcePath).toLowerCase() === TARGET_EXTENSION) {
			return sourcePath;
		}

		const targetPath = toMp4Path(sourcePath);
		const hasVideo = await this.hasVideoStream(sourcePath);
		await this.#exec(
			this.#settings.ffmpegPath,
			buildTranscodeArgs(sourcePath, targetPath, hasVideo),
		);

		await unlink(sourcePath);
		log(`Converted to mp4: ${path.basename(targetPath)}`);
		return targetPath;
	}

	async hasVideoStream(sourcePath: string): Promise<boolean> {
		const output = await this.#exec(
			this.#settings.ffprobePath,
			buildProbeArgs(sourcePath),
			false,
		);
		return output.trim() !== "";
	}

	async #exec(
		command: string,
		args: string[],
		requireSuccess = true,
	): Promise<string> {
		this.#logger.debug(`exec ${formatCommand(command, args)}`);

		let result: ProcessOutput;
		try {
			result = await this.#run(command, args);
		} catch (error) {
			const diagnostic = describeError(error);
			throw new TranscodeError(
				`ffmpeg conversion failed: ${diagnostic}`,
				diagnostic,
			);
		}

		if (requireSuccess && result.code !== 0) {
			const diagnostic =
				lastMeaningfulLines(result.stderr) ||
				`${path.basename(command)} exited with code ${result.code ?? "unknown"}`;
			throw new TranscodeError(
				`ffmpeg conversion failed: ${diagnostic}`,
				diagnostic,
			);
		}

		return result.stdout;
	}
}
