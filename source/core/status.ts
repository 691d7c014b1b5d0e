import type { ProgressEvent } from "./types.js";

export const READY_STATUS = "Ready";
export const COMPLETE_STATUS = "Download complete!";
export const ERROR_STATUS = "Error occurred";

/** Status label for a progress event, or `undefined` to keep the current one. */
export function statusForProgress(event: ProgressEvent): string | undefined {
	switch (event.kind) {
		case "downloading":
			return `Downloading: ${event.percent} at ${event.speed}, ETA: ${event.eta}`;
		case "processing":
			return "Post-processing...";
		case "finished":
			return undefined;
	}
}
