import {
	bookPatternSource,
	normalizeBookKey,
	resolveBook,
} from "./book-lexicon";
import { collectDiagnostics } from "./diagnostics";
import { resolveGroup } from "./parenthesized-group";
import {
	buildLocator,
	formatReference,
	toReference,
} from "./reference-parser";
import type {
	DiagnosticSink,
	DialectId,
	LocatorKind,
	ParsedReference,
} from "./types";

export type RewriteOutcome =
	| { type: "rewritten"; replacement: string; reference?: ParsedReference }
	| { type: "skipped" }
	| { type: "invalid"; reason: string };

export interface RewriteContext {
	/** Offset of the match in the text being standardized. */
	offset: number;
	report: DiagnosticSink;
}

export interface CitationDialect {
	id: DialectId;
	pattern: RegExp;
	rewrite(match: RegExpExecArray, context: RewriteContext): RewriteOutcome;
}

const GAP = "[ \\t\\u00a0]";
const BOOK = `(?<![A-Za-z0-9])(?<book>${bookPatternSource})(?![A-Za-z])\\.?`;
const DASH = `${GAP}*[-\\u2013\\u2014]${GAP}*`;
const MARKER = "(?<marker>[*#])?";
// Stops a match from covering only the prefix of a longer citation.
const END = `(?![0-9]|[:.][0-9]|${DASH}[0-9])`;

const CHAPTER_WORD = "(?:chapter|chap\\.?|ch\\.)";
const VERSE_WORD = "(?:verses|verse|vv\\.|v\\.)";
const RANGE_WORD = `(?:${DASH}|${GAP}+(?:to|through|thru)${GAP}+)`;

const SOURCES: Record<Exclude<DialectId, "parenthesized-group">, string> = {
	"double-colon": `${BOOK}${GAP}*(?<chapter>\\d+):(?<verse>\\d+):(?<end>\\d+)${END}${MARKER}`,
	period: `${BOOK}${GAP}*(?<chapter>\\d+)\\.(?<verse>\\d+)(?:${DASH}(?<end>\\d+))?${END}${MARKER}`,
	verbose: `${BOOK}${GAP}+${CHAPTER_WORD}${GAP}*(?<chapter>\\d+)(?:,?${GAP}+${VERSE_WORD}${GAP}*(?<verse>\\d+)(?:${RANGE_WORD}(?<end>\\d+))?)?${END}${MARKER}`,
	colon: `${BOOK}${GAP}*(?<chapter>\\d+):(?<verse>\\d+)(?:${DASH}(?<end>\\d+))?${END}${MARKER}`,
	space: `${BOOK}${GAP}+(?<chapter>\\d+)${GAP}+(?<verse>\\d+)(?:${DASH}(?<end>\\d+))?${END}${MARKER}`,
	"standalone-chapter": `${BOOK}${GAP}*(?<chapter>\\d+)(?![0-9]|[:.][0-9]|${DASH}[0-9]|${GAP}+[0-9])${MARKER}`,
};

// Keys that are also common English words. Capitalized at the start of a
// sentence ("He 3 times") they still read as prose, so they only count as
// books where a verse separator follows.
const WORD_KEYS = new Set(["he", "is", "am"]);

function startsCapitalized(book: string): boolean {
	const letter = book.match(/[A-Za-z]/)?.[0];
	return letter !== undefined && letter === letter.toUpperCase();
}

function locatorKind(id: DialectId, verse: string | undefined): LocatorKind {
	if (verse === undefined) return "chapter";
	return id === "period" ? "period" : "colon";
}

interface ReferenceDialectOptions {
	/** Skip matches whose book is one of `WORD_KEYS`. */
	rejectsWordKeys?: boolean;
}

/**
 * A dialect whose match carries book, chapter and optional verse, end verse
 * and marker groups. Outside parentheses the book must be capitalized, since
 * lower-case keys such as "is", "he" and "job" are ordinary words.
 */
function referenceDialect(
	id: Exclude<DialectId, "parenthesized-group">,
	options: ReferenceDialectOptions = {},
): CitationDialect {
	return {
		id,
		pattern: new RegExp(SOURCES[id], "gi"),
		rewrite(match) {
			const groups = match.groups ?? {};
			const book = groups.book;
			if (!book) return { type: "skipped" };
			if (!startsCapitalized(book)) return { type: "skipped" };
			if (options.rejectsWordKeys && WORD_KEYS.has(normalizeBookKey(book))) {
				return { type: "skipped" };
			}

			const locator = buildLocator(
				locatorKind(id, groups.verse),
				groups.chapter,
				groups.verse,
				groups.end,
				groups.marker,
				match[0],
			);
			if (!locator) {
				return {
					type: "invalid",
					reason: "chapter and verse must be positive integers",
				};
			}

			const reference = toReference(resolveBook(book), true, locator);
			return {
				type: "rewritten",
				replacement: formatReference(reference),
				reference,
			};
		},
	};
}

const groupDialect: CitationDialect = {
	id: "parenthesized-group",
	pattern: /\((?<interior>[^()]*)\)/g,
	rewrite(match, context) {
		const interior = match.groups?.interior ?? "";
		// Ordinary parentheticals resolve nothing; only report on real lists.
		const pending = collectDiagnostics();
		const resolution = resolveGroup(interior, {
			report: pending.sink,
			offset: context.offset + 1,
		});
		if (resolution.resolvedCount === 0) return { type: "skipped" };
		for (const diagnostic of pending.diagnostics) {
			context.report(diagnostic);
		}
		return { type: "rewritten", replacement: `(${resolution.text})` };
	},
};

/** Every dialect, highest precedence first. */
export const DIALECTS: readonly CitationDialect[] = [
	groupDialect,
	referenceDialect("double-colon"),
	referenceDialect("period"),
	referenceDialect("verbose"),
	referenceDialect("colon"),
	referenceDialect("space", { rejectsWordKeys: true }),
	referenceDialect("standalone-chapter", { rejectsWordKeys: true }),
];
