export {
	bookPatternSource,
	isKnownBook,
	listBookKeys,
	listCanonicalBooks,
	lookupBook,
	normalizeBookKey,
	resolveBook,
} from "./lib/book-lexicon";
export { collectDiagnostics, ignoreDiagnostics } from "./lib/diagnostics";
export type { CitationDialect, RewriteOutcome } from "./lib/dialects";
export {
	type GroupItem,
	type GroupResolution,
	resolveGroup,
} from "./lib/parenthesized-group";
export {
	detectMarker,
	formatReference,
	parseLocator,
	parseReference,
} from "./lib/reference-parser";
export {
	applyEdits,
	type CitationMatcher,
	findCitationEdits,
	getPatterns,
	standardizeText,
} from "./lib/standardize";
export type {
	CitationDiagnostic,
	CitationEdit,
	CitationMarker,
	DiagnosticKind,
	DiagnosticLevel,
	DiagnosticSink,
	DialectId,
	ParsedLocator,
	ParsedReference,
	StandardizeOptions,
} from "./lib/types";
