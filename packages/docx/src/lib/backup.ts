import { copyFile } from "node:fs/promises";
import path from "node:path";

export type BackupResult =
	| { success: true; backupPath: string }
	| { success: false; error: string };

const pad = (value: number) => String(value).padStart(2, "0");

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatBackupTimestamp(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}

export function backupPathFor(filePath: string, date: Date): string {
	const { dir, name, ext } = path.parse(filePath);
	return path.join(dir, `${name}_backup_${formatBackupTimestamp(date)}${ext}`);
}

/**
 * Copy a file next to itself as `<stem>_backup_<timestamp><ext>`.
 */
export async function createBackup(
	filePath: string,
	now: Date = new Date(),
): Promise<BackupResult> {
	const backupPath = backupPathFor(filePath, now);
	try {
		await copyFile(filePath, backupPath);
		return { success: true, backupPath };
	} catch (error) {
		return {
			success: false,
			error: error instanceof Error ? error.message : String(error),
		};
	}
}
