import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ensureOutputDir, waitForStableFile } from "../source/utils/fs.js";

describe("fs utils", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "clipdrop-fs-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("creates nested output directories", async () => {
		const target = path.join(dir, "a", "b");

		await expect(ensureOutputDir(target)).resolves.toBe(target);
	});

	it("refuses an output path that is a file", async () => {
		const file = path.join(dir, "taken");
		await writeFile(file, "x");

		await expect(ensureOutputDir(file)).rejects.toThrow();
	});

	it("reports a file whose size stopped changing as stable", async () => {
		const file = path.join(dir, "clip.webm");
		await writeFile(file, "0123456789");

		await expect(
			waitForStableFile(file, { timeoutMs: 1000, intervalMs: 1 }),
		).resolves.toBe(true);
	});

	it("gives up on a missing file after the timeout", async () => {
		await expect(
			waitForStableFile(path.join(dir, "missing.webm"), {
				timeoutMs: 20,
				intervalMs: 5,
			}),
		).resolves.toBe(false);
	});
});
