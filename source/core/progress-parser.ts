import type { ProgressEvent, ProgressPayload } from "./types.js";

export const YT_DLP_PROGRESS_PREFIX = "[clipdrop-progress]";

const MISSING = "N/A";
const ALREADY_DOWNLOADED =
	/^\[download\]\s+(.+?)\s+has already been downloaded$/;

export function isProgressLine(line: string): boolean {
	return line.includes(YT_DLP_PROGRESS_PREFIX);
}

/**
 * Parses a line printed through our `--progress-template`.
 *
 * Fields are `status|percent|speed|eta|filename`; the filename is last so a
 * `|` inside it survives the split.
 */
export function parseProgressLine(line: string): ProgressPayload | undefined {
	const markerIndex = line.indexOf(YT_DLP_PROGRESS_PREFIX);
	if (markerIndex < 0) {
		return parseAlreadyDownloaded(line);
	}

	const raw = line.slice(markerIndex + YT_DLP_PROGRESS_PREFIX.length).trim();
	const fields = raw.split("|");
	if (fields.length < 5) {
		return undefined;
	}

	const status = fields[0]?.trim().toLowerCase();
	if (!status) {
		return undefined;
	}

	return {
		status,
		percent: fields[1],
		speed: fields[2],
		eta: fields[3],
		filename: fields.slice(4).join("|").trim() || undefined,
	};
}

function parseAlreadyDownloaded(line: string): ProgressPayload | undefined {
	const match = line.match(ALREADY_DOWNLOADED);
	if (!match?.[1]) {
		return undefined;
	}

	return { status: "finished", filename: match[1] };
}

function textOrMissing(value?: string): string {
	const normalized = value?.trim();
	if (
		!normalized ||
		normalized.toLowerCase() === "na" ||
		normalized.toLowerCase() === "none" ||
		normalized.toLowerCase() === "unknown"
	) {
		return MISSING;
	}

	return normalized;
}

export function toDownloadingEvent(
	payload: ProgressPayload,
): ProgressEvent | undefined {
	if (payload.status !== "downloading") {
		return undefined;
	}

	return {
		kind: "downloading",
		percent: textOrMissing(payload.percent),
		speed: textOrMissing(payload.speed),
		eta: textOrMissing(payload.eta),
	};
}
