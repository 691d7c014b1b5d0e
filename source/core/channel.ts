import { EventEmitter } from "node:events";
import type { ChannelEvents, ProgressEvent } from "./types.js";

export type NotificationChannel = {
	logMessage(text: string): void;
	progress(event: ProgressEvent): void;
	complete(): void;
	error(message: string): void;
};

/**
 * Forwards events in the order they arrive, lets at most one terminal event
 * through and drops everything that follows it.
 */
export function guardChannel(channel: NotificationChannel): NotificationChannel {
	let settled = false;

	return {
		logMessage(text) {
			if (!settled) {
				channel.logMessage(text);
			}
		},
		progress(event) {
			if (!settled) {
				channel.progress(event);
			}
		},
		complete() {
			if (settled) {
				return;
			}
			settled = true;
			channel.complete();
		},
		error(message) {
			if (settled) {
				return;
			}
			settled = true;
			channel.error(message);
		},
	};
}

export class ChannelEmitter extends EventEmitter {
	override on<K extends keyof ChannelEvents>(
		event: K,
		listener: (payload: ChannelEvents[K]) => void,
	): this {
		return super.on(event, listener);
	}

	override off<K extends keyof ChannelEvents>(
		event: K,
		listener: (payload: ChannelEvents[K]) => void,
	): this {
		return super.off(event, listener);
	}

	override emit<K extends keyof ChannelEvents>(
		event: K,
		payload: ChannelEvents[K],
	): boolean {
		return super.emit(event, payload);
	}

	asChannel(): NotificationChannel {
		return {
			logMessage: (message) => {
				this.emit("log", { message });
			},
			progress: (event) => {
				this.emit("progress", { event });
			},
			complete: () => {
				this.emit("complete", {});
			},
			error: (message) => {
				this.emit("failed", { message });
			},
		};
	}
}
