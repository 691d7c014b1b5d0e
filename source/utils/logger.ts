import chalk from "chalk";

export type Logger = {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	debug(message: string): void;
};

type Writable = { write(chunk: string): unknown };

export type LoggerOptions = {
	verbose?: boolean;
	stream?: Writable;
};

// stdout is reserved for --json events.
export function createLogger(options: LoggerOptions = {}): Logger {
	const stream = options.stream ?? process.stderr;
	const write = (line: string) => {
		stream.write(`${line}\n`);
	};

	return {
		info(message) {
			write(message);
		},
		warn(message) {
			write(chalk.yellow(`warning: ${message}`));
		},
		error(message) {
			write(chalk.red(message));
		},
		debug(message) {
			if (options.verbose) {
				write(chalk.gray(message));
			}
		},
	};
}

export const silentLogger: Logger = {
	info() {},
	warn() {},
	error() {},
	debug() {},
};
