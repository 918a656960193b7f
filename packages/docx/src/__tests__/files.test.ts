import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	backupPathFor,
	createBackup,
	formatBackupTimestamp,
} from "../lib/backup";
import { findDocxFiles } from "../lib/discover";

let workDir: string;

beforeEach(async () => {
	workDir = await mkdtemp(join(tmpdir(), "scripture-refs-files-"));
});

afterEach(async () => {
	await rm(workDir, { recursive: true, force: true });
});

describe("createBackup", () => {
	const when = new Date(2024, 0, 2, 3, 4, 5);

	it("formats the local timestamp", () => {
		expect(formatBackupTimestamp(when)).toBe("20240102_030405");
		expect(backupPathFor(join("docs", "notes.docx"), when)).toBe(
			join("docs", "notes_backup_20240102_030405.docx"),
		);
	});

	it("copies the file beside the original", async () => {
		const original = join(workDir, "notes.docx");
		await writeFile(original, "contents");
		const result = await createBackup(original, when);
		expect(result).toEqual({
			success: true,
			backupPath: join(workDir, "notes_backup_20240102_030405.docx"),
		});
		expect(
			await readFile(
				join(workDir, "notes_backup_20240102_030405.docx"),
				"utf-8",
			),
		).toBe("contents");
	});

	it("reports a failed copy", async () => {
		const result = await createBackup(join(workDir, "missing.docx"), when);
		expect(result.success).toBe(false);
		expect(
			existsSync(join(workDir, "missing_backup_20240102_030405.docx")),
		).toBe(false);
	});
});

describe("findDocxFiles", () => {
	it("finds documents recursively and skips lock files", async () => {
		await mkdir(join(workDir, "sub"));
		const names = ["a.docx", "~$a.docx", "notes.txt", join("sub", "B.DOCX")];
		for (const name of names) {
			await writeFile(join(workDir, name), "");
		}
		expect(findDocxFiles(workDir)).toEqual([
			join(workDir, "a.docx"),
			join(workDir, "sub", "B.DOCX"),
		]);
	});
});
