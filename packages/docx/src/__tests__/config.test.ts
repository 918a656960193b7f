import { describe, expect, it } from "vitest";
import { resolveCliConfig } from "../lib/config";

describe("resolveCliConfig", () => {
	it("reads positionals and flags", () => {
		expect(
			resolveCliConfig([
				"in.docx",
				"--concurrency",
				"8",
				"out.docx",
				"--no-backup",
				"--verbose",
			]),
		).toEqual({
			input: "in.docx",
			output: "out.docx",
			backup: false,
			concurrency: 8,
			verbose: true,
			text: null,
		});
	});

	it("falls back to the environment, then to defaults", () => {
		const config = resolveCliConfig(["docs"], {
			SCRIPTURE_REFS_CONCURRENCY: "2",
			SCRIPTURE_REFS_VERBOSE: "true",
		});
		expect(config.concurrency).toBe(2);
		expect(config.verbose).toBe(true);
		expect(config.backup).toBe(true);

		expect(
			resolveCliConfig(["--concurrency", "zero"], {
				SCRIPTURE_REFS_CONCURRENCY: "-3",
			}).concurrency,
		).toBe(4);
	});

	it("reads direct text", () => {
		const config = resolveCliConfig(["--text", "Jn 3:16"]);
		expect(config.text).toBe("Jn 3:16");
		expect(config.input).toBe(null);
		expect(resolveCliConfig(["--text"]).text).toBe("");
	});
});
