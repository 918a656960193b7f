import { mkdir } from "node:fs/promises";
import path from "node:path";
import { type Logger, silentLogger } from "./logger";
import { type DocumentResult, processDocument } from "./process-document";
import { promiseAllWithConcurrency } from "./promise-all-with-concurrency";

export const DEFAULT_CONCURRENCY = 4;

export interface ProcessDocumentsOptions {
	/** Write results here under their own file names instead of in place. */
	outputDir?: string;
	backup?: boolean;
	concurrency?: number;
	logger?: Logger;
}

export interface BatchResult {
	results: DocumentResult[];
	succeeded: number;
	failed: number;
}

export function outputPathFor(inputPath: string, outputDir?: string): string {
	if (outputDir === undefined) return inputPath;
	return path.join(outputDir, path.basename(inputPath));
}

/**
 * Process several documents, at most `concurrency` at a time. Results keep
 * the order of `inputs`.
 */
export async function processDocuments(
	inputs: readonly string[],
	options: ProcessDocumentsOptions = {},
): Promise<BatchResult> {
	const logger = options.logger ?? silentLogger;
	if (options.outputDir !== undefined) {
		await mkdir(options.outputDir, { recursive: true });
	}

	const tasks = inputs.map(
		(inputPath) => () =>
			processDocument(inputPath, {
				outputPath: outputPathFor(inputPath, options.outputDir),
				backup: options.backup,
				logger,
			}),
	);
	const results = await promiseAllWithConcurrency(
		tasks,
		options.concurrency ?? DEFAULT_CONCURRENCY,
	);

	for (const result of results) {
		if (!result.success) {
			logger.error(`${result.outputPath}: ${result.error ?? "unknown error"}`);
		}
	}

	const succeeded = results.filter((result) => result.success).length;
	return { results, succeeded, failed: results.length - succeeded };
}
