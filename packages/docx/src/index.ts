export {
	type BackupResult,
	backupPathFor,
	createBackup,
	formatBackupTimestamp,
} from "./lib/backup";
export {
	type BatchResult,
	DEFAULT_CONCURRENCY,
	outputPathFor,
	type ProcessDocumentsOptions,
	processDocuments,
} from "./lib/batch";
export { type CliIo, runCli } from "./lib/cli";
export { type CliConfig, resolveCliConfig } from "./lib/config";
export { findDocxFiles } from "./lib/discover";
export {
	consoleLogger,
	createConsoleLogger,
	type Logger,
	logDiagnostics,
	silentLogger,
} from "./lib/logger";
export {
	type DocumentResult,
	type ProcessDocumentOptions,
	processDocument,
} from "./lib/process-document";
export { promiseAllWithConcurrency } from "./lib/promise-all-with-concurrency";
export { buildSampleDocument } from "./lib/sample-document";
export { diffText, distributeEdits, type TextEdit } from "./lib/text-blocks";
export { TextBlock, WordDocument } from "./lib/word-document";
