import { ignoreDiagnostics } from "./diagnostics";
import {
	type CitationDialect,
	DIALECTS,
	type RewriteContext,
	type RewriteOutcome,
} from "./dialects";
import type {
	CitationEdit,
	DialectId,
	DiagnosticSink,
	StandardizeOptions,
} from "./types";

export interface CitationMatcher {
	id: DialectId;
	pattern: RegExp;
	/** Canonical replacement for a match, or null to leave it as written. */
	rewrite(match: RegExpExecArray): string | null;
}

// Claimed spans are overwritten with this before later dialects scan, so no
// pattern can match into text an earlier dialect already owns.
const MASK_CHAR = "\u0000";

function freshPattern(pattern: RegExp): RegExp {
	return new RegExp(pattern.source, pattern.flags);
}

function runRewrite(
	dialect: CitationDialect,
	match: RegExpExecArray,
	context: RewriteContext,
): RewriteOutcome {
	try {
		return dialect.rewrite(match, context);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		context.report({
			kind: "rewrite-failed",
			level: "warn",
			message: `${dialect.id} rewrite failed: ${reason}`,
			text: match[0],
			offset: context.offset,
		});
		return { type: "invalid", reason };
	}
}

function scanDialect(
	dialect: CitationDialect,
	text: string,
	masked: string,
	report: DiagnosticSink,
): CitationEdit[] {
	const pattern = freshPattern(dialect.pattern);
	const edits: CitationEdit[] = [];

	let match = pattern.exec(masked);
	while (match !== null) {
		const start = match.index;
		const end = start + match[0].length;
		const original = text.slice(start, end);
		const outcome = runRewrite(dialect, match, { offset: start, report });

		if (outcome.type === "skipped") {
			pattern.lastIndex = start + 1;
		} else if (outcome.type === "invalid") {
			report({
				kind: "unparseable-span",
				level: "warn",
				message: `Left unchanged: ${outcome.reason}`,
				text: original,
				offset: start,
			});
			edits.push({
				start,
				end,
				original,
				replacement: original,
				dialect: dialect.id,
			});
		} else {
			edits.push({
				start,
				end,
				original,
				replacement: outcome.replacement,
				dialect: dialect.id,
			});
		}

		match = pattern.exec(masked);
	}

	return edits;
}

function maskSpans(text: string, edits: CitationEdit[]): string {
	let masked = text;
	for (const edit of edits) {
		masked =
			masked.slice(0, edit.start) +
			MASK_CHAR.repeat(edit.end - edit.start) +
			masked.slice(edit.end);
	}
	return masked;
}

/**
 * Find every citation in `text` and its canonical rewrite. Dialects run in
 * precedence order; each span is claimed by the first dialect that matches
 * it. Only spans whose text actually changes are returned, sorted by offset.
 */
export function findCitationEdits(
	text: string,
	options: StandardizeOptions = {},
): CitationEdit[] {
	const report = options.onDiagnostic ?? ignoreDiagnostics;
	const claimed: CitationEdit[] = [];
	let masked = text;

	for (const dialect of DIALECTS) {
		const edits = scanDialect(dialect, text, masked, report);
		claimed.push(...edits);
		masked = maskSpans(masked, edits);
	}

	const changed = claimed
		.filter((edit) => edit.replacement !== edit.original)
		.sort((a, b) => a.start - b.start);

	for (const edit of changed) {
		report({
			kind: "rewritten",
			level: "debug",
			message: `${edit.original} -> ${edit.replacement}`,
			text: edit.original,
			offset: edit.start,
		});
	}

	return changed;
}

/** Splice non-overlapping edits into the text they were computed from. */
export function applyEdits(
	text: string,
	edits: readonly CitationEdit[],
): string {
	const ordered = [...edits].sort((a, b) => a.start - b.start);
	let output = "";
	let cursor = 0;
	for (const edit of ordered) {
		if (edit.start < cursor) {
			throw new Error(
				`Overlapping edits at ${edit.start} (previous edit ends at ${cursor})`,
			);
		}
		output += text.slice(cursor, edit.start) + edit.replacement;
		cursor = edit.end;
	}
	return output + text.slice(cursor);
}

/**
 * Rewrite every scripture citation in `text` into the canonical
 * `Book Chapter:Verse[-End][Marker]` form. Text outside citations is left
 * untouched; running it twice gives the same result as running it once.
 */
export function standardizeText(
	text: string,
	options: StandardizeOptions = {},
): string {
	return applyEdits(text, findCitationEdits(text, options));
}

/**
 * The dialect matchers in precedence order, each with its own RegExp.
 * Applying them to pieces of a text only agrees with `standardizeText` when
 * no piece boundary falls inside a citation.
 */
export function getPatterns(): CitationMatcher[] {
	return DIALECTS.map((dialect) => ({
		id: dialect.id,
		pattern: freshPattern(dialect.pattern),
		rewrite: (match: RegExpExecArray) => {
			const outcome = runRewrite(dialect, match, {
				offset: match.index,
				report: ignoreDiagnostics,
			});
			return outcome.type === "rewritten" ? outcome.replacement : null;
		},
	}));
}
