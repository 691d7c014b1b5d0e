import { spawn } from "node:child_process";

export type ProcessOutput = {
	code: number | null;
	stdout: string;
	stderr: string;
};

export type ProcessRunner = (
	command: string,
	args: string[],
) => Promise<ProcessOutput>;

/**
 * Runs a command to completion and buffers its output. Rejects only when the
 * process cannot be started; a non-zero exit resolves with its code.
 */
export const runProcess: ProcessRunner = (command, args) =>
	new Promise((resolve, reject) => {
		const child = spawn(command, args, {
			stdio: ["ignore", "pipe", "pipe"],
			shell: false,
		});
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];

		child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
		child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
		child.on("error", reject);
		child.on("close", (code) => {
			resolve({
				code,
				stdout: Buffer.concat(stdout).toString("utf8"),
				stderr: Buffer.concat(stderr).toString("utf8"),
			});
		});
	});

export function formatCommand(command: string, args: string[]): string {
	return [command, ...args.map(quoteArg)].join(" ");
}

function quoteArg(arg: string): string {
	return /\s|["'`$\\]/.test(arg)
		? `"${arg.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`
		: arg;
}

export function lastMeaningfulLines(text: string, count = 5): string {
	return text
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean)
		.slice(-count)
		.join("\n");
}
