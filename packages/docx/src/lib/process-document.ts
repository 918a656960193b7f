import { stat, writeFile } from "node:fs/promises";
import path from "node:path";
import {
	type CitationDiagnostic,
	type DiagnosticSink,
	findCitationEdits,
} from "@scripture-refs/core";
import { createBackup } from "./backup";
import { type Logger, logDiagnostics, silentLogger } from "./logger";
import { WordDocument } from "./word-document";

export interface ProcessDocumentOptions {
	/** Where to write the result; defaults to the input path. */
	outputPath?: string;
	backup?: boolean;
	logger?: Logger;
}

export interface DocumentResult {
	success: boolean;
	changesMade: boolean;
	blocksProcessed: number;
	blocksChanged: number;
	citationsRewritten: number;
	backupPath: string | null;
	outputPath: string;
	diagnostics: CitationDiagnostic[];
	error: string | null;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

async function fileExists(filePath: string): Promise<boolean> {
	try {
		return (await stat(filePath)).isFile();
	} catch {
		return false;
	}
}

/**
 * Standardize every citation in a .docx. Failures are reported in the
 * result rather than thrown.
 */
export async function processDocument(
	inputPath: string,
	options: ProcessDocumentOptions = {},
): Promise<DocumentResult> {
	const logger = options.logger ?? silentLogger;
	const outputPath = options.outputPath ?? inputPath;
	const result: DocumentResult = {
		success: false,
		changesMade: false,
		blocksProcessed: 0,
		blocksChanged: 0,
		citationsRewritten: 0,
		backupPath: null,
		outputPath,
		diagnostics: [],
		error: null,
	};

	if (!(await fileExists(inputPath))) {
		result.error = `File not found: ${inputPath}`;
		return result;
	}

	if (options.backup ?? true) {
		const backup = await createBackup(inputPath);
		if (!backup.success) {
			result.error = `Failed to create backup: ${backup.error}`;
			return result;
		}
		result.backupPath = backup.backupPath;
		logger.debug(`Backup written to ${backup.backupPath}`);
	}

	let document: WordDocument;
	try {
		document = await WordDocument.open(inputPath);
	} catch (error) {
		result.error = `Could not open document: ${errorMessage(error)}`;
		return result;
	}

	const label = path.basename(inputPath);
	const log = logDiagnostics(logger, label);
	const onDiagnostic: DiagnosticSink = (diagnostic) => {
		result.diagnostics.push(diagnostic);
		log(diagnostic);
	};

	for (const block of document.blocks()) {
		result.blocksProcessed += 1;
		const edits = findCitationEdits(block.text, { onDiagnostic });
		if (edits.length === 0) continue;
		block.applyEdits(edits);
		result.blocksChanged += 1;
		result.citationsRewritten += edits.length;
	}
	result.changesMade = result.blocksChanged > 0;

	// An unchanged document is only written when it goes somewhere new.
	const movesFile = path.resolve(outputPath) !== path.resolve(inputPath);
	if (result.changesMade || movesFile) {
		try {
			await writeFile(outputPath, await document.save());
		} catch (error) {
			result.error = `Could not save document: ${errorMessage(error)}`;
			return result;
		}
	}

	logger.info(
		`${label}: ${result.citationsRewritten} citation(s) in ${result.blocksChanged}/${result.blocksProcessed} paragraph(s)`,
	);
	result.success = true;
	return result;
}
