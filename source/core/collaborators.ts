import type {
	DownloaderHooks,
	DownloaderOptions,
	DownloadResult,
} from "./types.js";

export type Downloader = {
	readonly name: string;
	download(
		url: string,
		options: DownloaderOptions,
		hooks: DownloaderHooks,
	): Promise<DownloadResult>;
};

export type LogEmitter = (message: string) => void;

export type Transcoder = {
	/** Resolves with the path of the file that remains on disk. */
	maybeConvertToMp4(sourcePath: string, log: LogEmitter): Promise<string>;
};
