import {
	configure,
	Uint8ArrayReader,
	Uint8ArrayWriter,
	ZipReader,
	ZipWriter,
} from "@zip.js/zip.js";

configure({ useWebWorkers: false });

export interface ZipFileEntry {
	filename: string;
	data: Uint8Array;
}

/**
 * Read every file entry of a ZIP archive, in archive order.
 */
export async function readZipEntries(
	bytes: Uint8Array,
): Promise<ZipFileEntry[]> {
	const reader = new ZipReader(new Uint8ArrayReader(bytes));
	try {
		const files: ZipFileEntry[] = [];
		for (const entry of await reader.getEntries()) {
			if (entry.directory) continue;
			const data = await entry.getData?.(new Uint8ArrayWriter());
			if (!data) {
				throw new Error(`ZIP entry has no data: ${entry.filename}`);
			}
			files.push({ filename: entry.filename, data });
		}
		return files;
	} finally {
		await reader.close();
	}
}

/**
 * Write entries into a new ZIP archive, keeping their order.
 */
export async function writeZipEntries(
	entries: readonly ZipFileEntry[],
): Promise<Uint8Array> {
	const writer = new ZipWriter(new Uint8ArrayWriter());
	for (const entry of entries) {
		await writer.add(entry.filename, new Uint8ArrayReader(entry.data));
	}
	return writer.close();
}
