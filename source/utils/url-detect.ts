import { InvalidInputError } from "../core/errors.js";

export function parseHttpUrl(input: string): URL {
	const trimmed = input.trim();
	if (!trimmed) {
		throw new InvalidInputError("Please enter a URL");
	}

	let parsed: URL;
	try {
		parsed = new URL(trimmed);
	} catch {
		throw new InvalidInputError(`Invalid URL: ${trimmed}`);
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		throw new InvalidInputError(
			`Unsupported URL scheme: ${parsed.protocol}. Use http/https.`,
		);
	}

	return parsed;
}
