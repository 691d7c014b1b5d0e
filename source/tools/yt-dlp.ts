import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Downloader } from "../core/collaborators.js";
import { DownloadError } from "../core/errors.js";
import { classifyYtDlpLine } from "../core/log-adapter.js";
import { toYtDlpArgs } from "../core/options.js";
import { isProgressLine, parseProgressLine } from "../core/progress-parser.js";
import type {
	DownloaderHooks,
	DownloaderOptions,
	DownloadResult,
} from "../core/types.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { formatCommand } from "../utils/process.js";

export type YtDlpSettings = {
	ytDlpPath: string;
	ffmpegLocation?: string;
	verbose?: boolean;
	logger?: Logger;
};

// Post-processors that move the download to a new file name.
const FINAL_PATH_PATTERN =
	/^\[(?:Merger\] Merging formats into|ExtractAudio\] Destination:)\s+"?(.+?)"?$/;

export class YtDlpDownloader implements Downloader {
	readonly name: string = "yt-dlp";
	readonly #settings: YtDlpSettings;
	readonly #logger: Logger;

	constructor(settings: YtDlpSettings) {
		this.#settings = settings;
		this.#logger = settings.logger ?? silentLogger;
	}

	async download(
		url: string,
		options: DownloaderOptions,
		hooks: DownloaderHooks,
	): Promise<DownloadResult> {
		const args = toYtDlpArgs(options, url, {
			ffmpegPath: this.#settings.ffmpegLocation,
			verbose: this.#settings.verbose,
		});
		this.#logger.debug(`exec ${formatCommand(this.#settings.ytDlpPath, args)}`);

		const stderrLines: string[] = [];
		let filePath: string | undefined;

		const echo = (line: string) => {
			if (!options.quiet) {
				process.stderr.write(`${line}\n`);
			}
		};

		await new Promise<void>((resolve, reject) => {
			const child = spawn(this.#settings.ytDlpPath, args, {
				stdio: ["ignore", "pipe", "pipe"],
				shell: false,
			});

			// A hook that throws stops the download instead of escaping the listener.
			const guarded =
				(handle: (line: string) => void) =>
				(line: string): void => {
					try {
						handle(line);
					} catch (error) {
						child.kill();
						reject(error);
					}
				};

			const stdoutReader = createInterface({ input: child.stdout });
			stdoutReader.on(
				"line",
				guarded((line) => {
					echo(line);
					const payload = parseProgressLine(line);
					if (payload?.status === "finished" && payload.filename) {
						filePath = payload.filename;
					}
					if (payload) {
						hooks.onProgress(payload);
					}
					if (isProgressLine(line)) {
						return;
					}

					const finalPath = line.match(FINAL_PATH_PATTERN)?.[1];
					if (finalPath) {
						filePath = finalPath;
					}

					const { level, message } = classifyYtDlpLine(line, "stdout");
					hooks.onLog(level, message);
				}),
			);

			const stderrReader = createInterface({ input: child.stderr });
			stderrReader.on(
				"line",
				guarded((line) => {
					echo(line);
					stderrLines.push(line);
					const { level, message } = classifyYtDlpLine(line, "stderr");
					hooks.onLog(level, message);
				}),
			);

			child.on("error", (error) => {
				reject(new DownloadError(error.message));
			});

			child.on("close", (code) => {
				if (code === 0) {
					resolve();
					return;
				}

				const stderrSnippet = stderrLines.slice(-5).join("\n");
				reject(
					new DownloadError(
						buildYtDlpErrorMessage(code, stderrSnippet),
						stderrSnippet,
					),
				);
			});
		});

		return { filePath };
	}
}

export function buildYtDlpErrorMessage(
	code: number | null,
	stderrSnippet: string,
): string {
	const hint = getMostRelevantErrorLine(stderrSnippet);
	if (!hint) {
		return `yt-dlp failed with exit code ${code ?? "unknown"}`;
	}

	return hint;
}

function getMostRelevantErrorLine(stderrSnippet: string): string | undefined {
	const lines = stderrSnippet
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean);
	if (lines.length === 0) {
		return undefined;
	}

	return (
		lines.findLast((line) => line.toLowerCase().startsWith("error:")) ??
		lines[lines.length - 1]
	);
}
