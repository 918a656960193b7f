import { stat } from "node:fs/promises";
import path from "node:path";
import { standardizeText } from "@scripture-refs/core";
import { processDocuments } from "./batch";
import { type CliConfig, resolveCliConfig } from "./config";
import { findDocxFiles } from "./discover";
import {
	consoleLogger,
	createConsoleLogger,
	type Logger,
	logDiagnostics,
} from "./logger";
import { processDocument } from "./process-document";

export const USAGE =
	'Usage: scripture-refs <input> [output] [--no-backup] [--concurrency N] [--verbose] [--text "..."]';

export const DEFAULT_EXAMPLE = "See Gal. 3:27* and 1 Cor. 13.4-7";

export interface CliIo {
	print: (line: string) => void;
	logger: Logger;
}

async function isDirectory(target: string): Promise<boolean> {
	try {
		return (await stat(target)).isDirectory();
	} catch {
		return false;
	}
}

function runText(config: CliConfig, io: CliIo): number {
	const text = config.text || DEFAULT_EXAMPLE;
	const standardized = standardizeText(text, {
		onDiagnostic: logDiagnostics(io.logger, "text"),
	});
	io.print(`Original text: ${text}`);
	io.print(`Standardized text: ${standardized}`);
	return 0;
}

async function runDirectory(
	input: string,
	config: CliConfig,
	io: CliIo,
): Promise<number> {
	const inputs = findDocxFiles(input);
	io.logger.info(`Found ${inputs.length} document(s) in ${input}`);
	const batch = await processDocuments(inputs, {
		outputDir: config.output ?? undefined,
		backup: config.backup,
		concurrency: config.concurrency,
		logger: io.logger,
	});
	io.logger.info(
		`Processed ${batch.results.length} document(s): ${batch.succeeded} succeeded, ${batch.failed} failed`,
	);
	return batch.failed > 0 ? 1 : 0;
}

async function runFile(
	input: string,
	config: CliConfig,
	io: CliIo,
): Promise<number> {
	const result = await processDocument(input, {
		outputPath: config.output ?? undefined,
		backup: config.backup,
		logger: io.logger,
	});
	if (!result.success) {
		io.logger.error(`${input}: ${result.error ?? "unknown error"}`);
		return 1;
	}
	io.logger.info(
		result.changesMade
			? `Saved ${result.outputPath}`
			: `No citations to change in ${input}`,
	);
	return 0;
}

/**
 * Run the command line and return its exit code. Unexpected errors are
 * logged, not thrown.
 */
export async function runCli(
	argv: readonly string[],
	env: Record<string, string | undefined>,
	io?: Partial<CliIo>,
): Promise<number> {
	const config = resolveCliConfig(argv, env);
	const resolved: CliIo = {
		print: io?.print ?? ((line) => console.log(line)),
		logger:
			io?.logger ??
			(config.verbose ? createConsoleLogger(true) : consoleLogger),
	};
	try {
		if (config.text !== null) return runText(config, resolved);
		const { input } = config;
		if (input === null) {
			resolved.logger.error(USAGE);
			return 1;
		}
		if (await isDirectory(input)) {
			return await runDirectory(input, config, resolved);
		}
		if (path.extname(input).toLowerCase() === ".docx") {
			return await runFile(input, config, resolved);
		}
		resolved.logger.error(
			`Input must be a .docx file or a directory: ${input}`,
		);
		return 1;
	} catch (error) {
		resolved.logger.error(
			error instanceof Error ? error.message : String(error),
		);
		return 1;
	}
}
