import { readdirSync } from "node:fs";
import path from "node:path";

const walk = (current: string): string[] => {
	const entries = readdirSync(current, { withFileTypes: true });
	const files: string[] = [];
	for (const entry of entries) {
		const fullPath = path.join(current, entry.name);
		if (entry.isDirectory()) {
			files.push(...walk(fullPath));
			continue;
		}
		if (entry.isFile()) {
			files.push(fullPath);
		}
	}
	return files;
};

/** Word keeps `~$name.docx` lock files beside documents that are open. */
const isLockFile = (file: string) => path.basename(file).startsWith("~$");

/**
 * Every .docx below `dir`, as sorted absolute paths.
 */
export function findDocxFiles(dir: string): string[] {
	return walk(path.resolve(dir))
		.filter((file) => path.extname(file).toLowerCase() === ".docx")
		.filter((file) => !isLockFile(file))
		.sort();
}
