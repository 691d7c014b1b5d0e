import { describe, expect, it } from "vitest";
import {
	isProgressLine,
	parseProgressLine,
	toDownloadingEvent,
} from "../source/core/progress-parser.js";

describe("parseProgressLine", () => {
	it("reads a downloading line from the progress template", () => {
		const payload = parseProgressLine(
			"[clipdrop-progress] downloading|  42.0%|   1.50MiB/s|00:12|/tmp/out/clip.webm",
		);

		expect(payload).toEqual({
			status: "downloading",
			percent: "  42.0%",
			speed: "   1.50MiB/s",
			eta: "00:12",
			filename: "/tmp/out/clip.webm",
		});
	});

	it("keeps pipes that belong to the file name", () => {
		const payload = parseProgressLine(
			"[clipdrop-progress] finished|100.0%|NA|NA|/tmp/out/a|b.webm",
		);

		expect(payload?.status).toBe("finished");
		expect(payload?.filename).toBe("/tmp/out/a|b.webm");
	});

	it("skips a marker line with too few fields", () => {
		expect(parseProgressLine("[clipdrop-progress] downloading|42%")).toBe(
			undefined,
		);
	});

	it("treats an already downloaded file as finished", () => {
		expect(
			parseProgressLine(
				"[download] /tmp/out/clip.webm has already been downloaded",
			),
		).toEqual({ status: "finished", filename: "/tmp/out/clip.webm" });
	});

	it("ignores ordinary log lines", () => {
		expect(parseProgressLine("[youtube] abc123: Downloading webpage")).toBe(
			undefined,
		);
		expect(isProgressLine("[youtube] abc123: Downloading webpage")).toBe(
			false,
		);
		expect(isProgressLine("[clipdrop-progress] downloading|")).toBe(true);
	});
});

describe("toDownloadingEvent", () => {
	it("trims the text fields", () => {
		expect(
			toDownloadingEvent({
				status: "downloading",
				percent: "  42.0%",
				speed: " 1.50MiB/s",
				eta: "00:12",
			}),
		).toEqual({
			kind: "downloading",
			percent: "42.0%",
			speed: "1.50MiB/s",
			eta: "00:12",
		});
	});

	it("falls back to N/A for each missing field", () => {
		expect(
			toDownloadingEvent({
				status: "downloading",
				percent: "NA",
				speed: "",
				eta: undefined,
			}),
		).toEqual({
			kind: "downloading",
			percent: "N/A",
			speed: "N/A",
			eta: "N/A",
		});
	});

	it("returns nothing for other statuses", () => {
		expect(toDownloadingEvent({ status: "finished" })).toBe(undefined);
	});
});
