export type CitationMarker = "*" | "#";

export interface ParsedReference {
	book: string;
	bookKnown: boolean;
	chapter: number;
	verseStart: number;
	verseEnd?: number;
	marker?: CitationMarker;
}

export type LocatorKind = "colon" | "period" | "chapter";

export interface ParsedLocator {
	kind: LocatorKind;
	chapter: number;
	verseStart: number;
	verseEnd?: number;
	marker?: CitationMarker;
}

export type DialectId =
	| "parenthesized-group"
	| "double-colon"
	| "period"
	| "verbose"
	| "colon"
	| "space"
	| "standalone-chapter";

/** A claimed span of the input and the text that replaces it. */
export interface CitationEdit {
	start: number;
	end: number;
	original: string;
	replacement: string;
	dialect: DialectId;
}

export type DiagnosticKind =
	| "rewritten"
	| "unparseable-span"
	| "unknown-book"
	| "unresolved-group-item"
	| "rewrite-failed";

export type DiagnosticLevel = "debug" | "info" | "warn";

export interface CitationDiagnostic {
	kind: DiagnosticKind;
	level: DiagnosticLevel;
	message: string;
	text: string;
	offset?: number;
}

export type DiagnosticSink = (diagnostic: CitationDiagnostic) => void;

export interface StandardizeOptions {
	onDiagnostic?: DiagnosticSink;
}
