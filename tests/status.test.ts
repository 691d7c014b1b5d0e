import { describe, expect, it } from "vitest";
import { statusForProgress } from "../source/core/status.js";
import { parseHttpUrl } from "../source/utils/url-detect.js";

describe("statusForProgress", () => {
	it("describes a download in flight", () => {
		expect(
			statusForProgress({
				kind: "downloading",
				percent: "42.0%",
				speed: "N/A",
				eta: "00:10",
			}),
		).toBe("Downloading: 42.0% at N/A, ETA: 00:10");
	});

	it("shows post-processing and keeps the label on finish", () => {
		expect(statusForProgress({ kind: "processing" })).toBe(
			"Post-processing...",
		);
		expect(
			statusForProgress({ kind: "finished", filePath: "/tmp/out/a.webm" }),
		).toBe(undefined);
	});
});

describe("parseHttpUrl", () => {
	it("accepts http and https links", () => {
		expect(parseHttpUrl("  https://example.com/watch?v=abc  ").toString()).toBe(
			"https://example.com/watch?v=abc",
		);
	});

	it("rejects empty input and other schemes", () => {
		expect(() => parseHttpUrl("   ")).toThrow("Please enter a URL");
		expect(() => parseHttpUrl("ftp://example.com/file")).toThrow(
			"Unsupported URL scheme: ftp:. Use http/https.",
		);
	});
});
