export const FORMAT_SELECTIONS = ["mp4", "mp3", "webm", "best"] as const;

export type FormatSelection = (typeof FORMAT_SELECTIONS)[number];

export type DownloadRequest = {
	readonly url: string;
	readonly outputDir: string;
	readonly format: FormatSelection;
	readonly withSubtitles: boolean;
	readonly withThumbnail: boolean;
	readonly convertToMp4: boolean;
};

export type ProgressEvent =
	| { kind: "downloading"; percent: string; speed: string; eta: string }
	| { kind: "processing" }
	| { kind: "finished"; filePath: string };

export type DownloadOutcome =
	| { status: "success"; filePath?: string }
	| { status: "failure"; message: string };

export type ExtractAudioStep = {
	readonly key: "FFmpegExtractAudio";
	readonly preferredCodec: "mp3";
	readonly preferredQuality: string;
};

export type ConvertThumbnailStep = {
	readonly key: "FFmpegThumbnailsConvertor";
	readonly format: "jpg";
};

export type PostProcessStep = ExtractAudioStep | ConvertThumbnailStep;

export type DownloaderOptions = {
	readonly outputTemplate: string;
	readonly format?: string;
	readonly postprocessors: readonly PostProcessStep[];
	readonly writeSubtitles: boolean;
	readonly writeAutomaticSubtitles: boolean;
	readonly writeThumbnail: boolean;
	readonly quiet: boolean;
};

export type DownloaderLogLevel = "debug" | "info" | "warning" | "error";

/** Raw status report as yt-dlp hands it to a progress hook. */
export type ProgressPayload = {
	status: string;
	percent?: string;
	speed?: string;
	eta?: string;
	filename?: string;
};

export type DownloaderHooks = {
	onProgress: (payload: ProgressPayload) => void;
	onLog: (level: DownloaderLogLevel, message: string) => void;
};

export type DownloadResult = {
	filePath?: string;
};

export type RequestState = "idle" | "running" | "succeeded" | "failed";

export type ChannelEvents = {
	log: { message: string };
	progress: { event: ProgressEvent };
	complete: Record<string, never>;
	failed: { message: string };
};
