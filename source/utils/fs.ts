import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

export async function ensureOutputDir(outputDir: string): Promise<string> {
	const resolved = path.resolve(outputDir);
	await mkdir(resolved, { recursive: true });
	const info = await stat(resolved);
	if (!info.isDirectory()) {
		throw new Error(`Output path is not a directory: ${resolved}`);
	}
	return resolved;
}

export type StabilityOptions = {
	timeoutMs: number;
	intervalMs: number;
};

/**
 * Polls the file size until two consecutive reads agree or the timeout
 * elapses. Returns whether the file was seen stable.
 */
export async function waitForStableFile(
	filePath: string,
	options: StabilityOptions,
): Promise<boolean> {
	const deadline = Date.now() + options.timeoutMs;
	let previousSize: number | undefined;

	for (;;) {
		const size = await sizeOf(filePath);
		if (size !== undefined && size === previousSize) {
			return true;
		}
		previousSize = size;

		if (Date.now() >= deadline) {
			return false;
		}
		await sleep(options.intervalMs);
	}
}

async function sizeOf(filePath: string): Promise<number | undefined> {
	try {
		const info = await stat(filePath);
		return info.isFile() ? info.size : undefined;
	} catch {
		return undefined;
	}
}
