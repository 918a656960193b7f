import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../lib/cli";
import { silentLogger } from "../lib/logger";
import { buildSampleDocument } from "../lib/sample-document";
import { WordDocument } from "../lib/word-document";

function capture() {
	const lines: string[] = [];
	return {
		lines,
		io: { print: (line: string) => lines.push(line), logger: silentLogger },
	};
}

describe("runCli", () => {
	let workDir: string;

	beforeEach(async () => {
		workDir = await mkdtemp(join(tmpdir(), "scripture-refs-cli-"));
	});

	afterEach(async () => {
		await rm(workDir, { recursive: true, force: true });
	});

	it("standardizes text given on the command line", async () => {
		const { lines, io } = capture();
		expect(await runCli(["--text", "Jn 3:16"], {}, io)).toBe(0);
		expect(lines).toEqual([
			"Original text: Jn 3:16",
			"Standardized text: John 3:16",
		]);
	});

	it("logs debug output to the console only with --verbose", async () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		try {
			const print = () => {};
			await runCli(["--text", "Jn 3:16"], {}, { print });
			expect(debug).not.toHaveBeenCalled();

			await runCli(["--text", "Jn 3:16", "--verbose"], {}, { print });
			expect(debug).toHaveBeenCalledWith(
				'[scripture-refs] text: Jn 3:16 -> John 3:16: "Jn 3:16"',
			);
		} finally {
			debug.mockRestore();
		}
	});

	it("uses the built-in example for empty text", async () => {
		const { lines, io } = capture();
		await runCli(["--text"], {}, io);
		expect(lines[1]).toBe(
			"Standardized text: See Galatians 3:27* and 1 Corinthians 13:4-7",
		);
	});

	it("fails without a usable input", async () => {
		const { io } = capture();
		expect(await runCli([], {}, io)).toBe(1);
		expect(await runCli([join(workDir, "notes.txt")], {}, io)).toBe(1);
	});

	it("processes a directory into an output directory", async () => {
		await writeFile(join(workDir, "a.docx"), await buildSampleDocument());
		const outputDir = join(workDir, "out");
		const { io } = capture();
		expect(
			await runCli([workDir, outputDir, "--no-backup"], {}, io),
		).toBe(0);
		const texts = (await WordDocument.open(join(outputDir, "a.docx")))
			.blocks()
			.map((block) => block.text);
		expect(texts).toContain("Acts 2:12-16 records how the crowd reacted.");
	});

	it("exits non-zero when a document fails", async () => {
		const broken = join(workDir, "broken.docx");
		await writeFile(broken, "not a zip archive");
		const { io } = capture();
		expect(await runCli([broken, "--no-backup"], {}, io)).toBe(1);
	});
});
