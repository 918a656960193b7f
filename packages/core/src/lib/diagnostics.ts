import type { CitationDiagnostic, DiagnosticSink } from "./types";

export const ignoreDiagnostics: DiagnosticSink = () => {};

/**
 * Accumulating sink, for callers that want the diagnostics of one run as a
 * list rather than a stream.
 */
export function collectDiagnostics(): {
	sink: DiagnosticSink;
	diagnostics: CitationDiagnostic[];
} {
	const diagnostics: CitationDiagnostic[] = [];
	return {
		sink: (diagnostic) => {
			diagnostics.push(diagnostic);
		},
		diagnostics,
	};
}
