import { platform } from "node:os";
import { type ProcessRunner, runProcess } from "../utils/process.js";
import type { ToolPaths } from "./config.js";
import { DependencyError } from "./errors.js";

type Tool = "yt-dlp" | "ffmpeg";

const INSTALL_HINTS: Record<Tool, Partial<Record<NodeJS.Platform, string>>> = {
	"yt-dlp": {
		darwin: "brew install yt-dlp",
		win32: "winget install yt-dlp",
	},
	ffmpeg: {
		darwin: "brew install ffmpeg",
		linux: "sudo apt install ffmpeg",
		win32: "winget install ffmpeg",
	},
};

const FALLBACK_HINTS: Record<Tool, string> = {
	"yt-dlp": "pip install yt-dlp",
	ffmpeg: "see https://ffmpeg.org/download.html",
};

export function remediationFor(
	tool: Tool,
	os: NodeJS.Platform = platform(),
): string {
	const hint = INSTALL_HINTS[tool][os] ?? FALLBACK_HINTS[tool];
	const label = tool === "ffmpeg" ? "FFmpeg" : "yt-dlp";
	return `${label} is not installed. Please install it with '${hint}'`;
}

/**
 * Verifies that yt-dlp and ffmpeg can be started. Throws a DependencyError
 * naming the first tool that is missing.
 */
export async function checkDependencies(
	tools: ToolPaths,
	run: ProcessRunner = runProcess,
	os: NodeJS.Platform = platform(),
): Promise<void> {
	const checks: Array<[Tool, string, string[]]> = [
		["yt-dlp", tools.ytDlpPath, ["--version"]],
		["ffmpeg", tools.ffmpegPath, ["-version"]],
		["ffmpeg", tools.ffprobePath, ["-version"]],
	];

	for (const [tool, command, args] of checks) {
		if (!(await isRunnable(run, command, args))) {
			throw new DependencyError(remediationFor(tool, os));
		}
	}
}

async function isRunnable(
	run: ProcessRunner,
	command: string,
	args: string[],
): Promise<boolean> {
	try {
		const result = await run(command, args);
		return result.code === 0;
	} catch {
		return false;
	}
}
