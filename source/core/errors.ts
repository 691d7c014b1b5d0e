export class ClipdropError extends Error {
	readonly exitCode: 1 | 2 | 3;

	constructor(message: string, exitCode: 1 | 2 | 3) {
		super(message);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}

export class InvalidInputError extends ClipdropError {
	constructor(message: string) {
		super(message, 2);
	}
}

export class DependencyError extends ClipdropError {
	constructor(message: string) {
		super(message, 3);
	}
}

export class DownloadError extends ClipdropError {
	readonly stderrSnippet?: string;

	constructor(message: string, stderrSnippet?: string) {
		super(message, 1);
		this.stderrSnippet = stderrSnippet;
	}
}

export class TranscodeError extends ClipdropError {
	readonly diagnostic: string;

	constructor(message: string, diagnostic: string) {
		super(message, 1);
		this.diagnostic = diagnostic;
	}
}

export class OrchestratorBusyError extends ClipdropError {
	constructor() {
		super("A download is already running; wait for it to finish.", 1);
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	return String(error);
}

export function toExitCode(error: unknown): 1 | 2 | 3 {
	if (error instanceof ClipdropError) {
		return error.exitCode;
	}

	return 1;
}
