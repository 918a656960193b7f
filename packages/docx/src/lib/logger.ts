import type { CitationDiagnostic, DiagnosticSink } from "@scripture-refs/core";

/**
 * Logger interface for consistent error handling
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

const PREFIX = "[scripture-refs]";

/**
 * Console logger; debug output only when verbose
 */
export function createConsoleLogger(verbose = false): Logger {
	return {
		debug: (message, ...args) => {
			if (verbose) console.debug(`${PREFIX} ${message}`, ...args);
		},
		info: (message, ...args) => console.log(`${PREFIX} ${message}`, ...args),
		warn: (message, ...args) => console.warn(`${PREFIX} ${message}`, ...args),
		error: (message, ...args) =>
			console.error(`${PREFIX} ${message}`, ...args),
	};
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

function formatDiagnostic(diagnostic: CitationDiagnostic): string {
	return `${diagnostic.message}: "${diagnostic.text}"`;
}

/** Forward citation diagnostics to a logger at their own level. */
export function logDiagnostics(logger: Logger, context: string): DiagnosticSink {
	return (diagnostic) => {
		logger[diagnostic.level](`${context}: ${formatDiagnostic(diagnostic)}`);
	};
}
