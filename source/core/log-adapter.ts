import type { DownloaderLogLevel } from "./types.js";

const DEBUG_MARKER = "[debug] ";

export type ClassifiedLine = {
	level: DownloaderLogLevel;
	message: string;
};

export function classifyYtDlpLine(
	line: string,
	stream: "stdout" | "stderr",
): ClassifiedLine {
	if (line.startsWith(DEBUG_MARKER)) {
		return { level: "debug", message: line };
	}

	if (stream === "stderr") {
		const match = line.match(/^(WARNING|ERROR):\s*(.*)$/);
		const label = match?.[1];
		const text = match?.[2];
		if (label && text !== undefined) {
			return {
				level: label === "WARNING" ? "warning" : "error",
				message: text,
			};
		}
	}

	return { level: "info", message: line };
}

/**
 * Turns a downloader log entry into the text shown to the user, or
 * `undefined` when the entry is debug noise.
 */
export function formatLogLine(
	level: DownloaderLogLevel,
	message: string,
): string | undefined {
	switch (level) {
		case "debug":
			return message.startsWith(DEBUG_MARKER) ? undefined : message;
		case "info":
			return message;
		case "warning":
			return `Warning: ${message}`;
		case "error":
			return `Error: ${message}`;
	}
}
