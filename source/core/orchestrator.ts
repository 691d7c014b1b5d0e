import path from "node:path";
import { setImmediate as defer } from "node:timers/promises";
import { guardChannel, type NotificationChannel } from "./channel.js";
import type { Downloader, Transcoder } from "./collaborators.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import {
	DownloadError,
	describeError,
	OrchestratorBusyError,
} from "./errors.js";
import { formatLogLine } from "./log-adapter.js";
import { buildDownloaderOptions } from "./options.js";
import { toDownloadingEvent } from "./progress-parser.js";
import type {
	DownloaderHooks,
	DownloadOutcome,
	DownloadRequest,
	RequestState,
} from "./types.js";

export type OrchestratorDeps = {
	downloader: Downloader;
	transcoder: Transcoder;
	logger?: Logger;
};

export type DownloadHandle = {
	id: string;
	outcome: Promise<DownloadOutcome>;
};

/**
 * Runs one download at a time. `submit` returns before any work starts;
 * progress, log lines and exactly one terminal event reach the channel
 * afterwards, in that order.
 */
export class DownloadOrchestrator {
	readonly #downloader: Downloader;
	readonly #transcoder: Transcoder;
	readonly #logger: Logger;
	#state: RequestState = "idle";
	#sequence = 0;

	constructor(deps: OrchestratorDeps) {
		this.#downloader = deps.downloader;
		this.#transcoder = deps.transcoder;
		this.#logger = deps.logger ?? silentLogger;
	}

	get state(): RequestState {
		return this.#state;
	}

	submit(request: DownloadRequest, channel: NotificationChannel): DownloadHandle {
		if (this.#state === "running") {
			throw new OrchestratorBusyError();
		}

		this.#state = "running";
		this.#sequence += 1;

		return {
			id: `request-${this.#sequence}`,
			outcome: this.#run(request, guardChannel(channel)),
		};
	}

	async #run(
		request: DownloadRequest,
		channel: NotificationChannel,
	): Promise<DownloadOutcome> {
		await defer();

		let outcome: DownloadOutcome;
		try {
			const filePath = await this.#execute(request, channel);
			outcome = { status: "success", filePath };
		} catch (error) {
			if (error instanceof DownloadError && error.stderrSnippet) {
				this.#logger.debug(error.stderrSnippet);
			}
			outcome = { status: "failure", message: describeError(error) };
		}

		this.#state = outcome.status === "success" ? "succeeded" : "failed";
		try {
			if (outcome.status === "success") {
				channel.complete();
			} else {
				channel.error(outcome.message);
			}
		} catch (error) {
			this.#logger.warn(
				`Terminal notification failed: ${describeError(error)}`,
			);
		}

		return outcome;
	}

	async #execute(
		request: DownloadRequest,
		channel: NotificationChannel,
	): Promise<string | undefined> {
		const options = buildDownloaderOptions(request);

		channel.logMessage(`Starting download of ${request.url}`);
		const result = await this.#downloader.download(
			request.url,
			options,
			createHooks(channel, this.#logger),
		);

		if (
			request.format !== "best" ||
			!request.convertToMp4 ||
			!result.filePath
		) {
			return result.filePath;
		}

		channel.progress({ kind: "processing" });
		return this.#transcoder.maybeConvertToMp4(result.filePath, (message) =>
			channel.logMessage(message),
		);
	}
}

function createHooks(
	channel: NotificationChannel,
	logger: Logger,
): DownloaderHooks {
	return {
		onProgress(payload) {
			if (payload.status === "downloading") {
				// A bad update is dropped on its own; the download carries on.
				try {
					const event = toDownloadingEvent(payload);
					if (event) {
						channel.progress(event);
					}
				} catch (error) {
					logger.warn(`Skipped a progress update: ${describeError(error)}`);
				}
				return;
			}

			if (payload.status === "finished") {
				const fileName = payload.filename ?? "Unknown";
				if (payload.filename) {
					channel.progress({ kind: "finished", filePath: payload.filename });
				}
				channel.logMessage(`Download finished: ${path.basename(fileName)}`);
				channel.progress({ kind: "processing" });
			}
		},
		onLog(level, message) {
			const text = formatLogLine(level, message);
			if (text !== undefined) {
				channel.logMessage(text);
			}
		},
	};
}
