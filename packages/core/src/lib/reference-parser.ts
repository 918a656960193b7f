import { matchBookPrefix, resolveBook } from "./book-lexicon";
import type {
	CitationMarker,
	LocatorKind,
	ParsedLocator,
	ParsedReference,
} from "./types";

const DASH = "\\s*[-\\u2013\\u2014]\\s*";
const MARKER = "\\s*([*#])?";

// Tried in order against the whole locator string.
const LOCATOR_PATTERNS: ReadonlyArray<{ kind: LocatorKind; re: RegExp }> = [
	{
		kind: "colon",
		re: new RegExp(`^(\\d+)\\s*:\\s*(\\d+)(?:${DASH}(\\d+))?${MARKER}$`),
	},
	{
		kind: "colon",
		re: new RegExp(`^(\\d+)\\s*:\\s*(\\d+)\\s*:\\s*(\\d+)${MARKER}$`),
	},
	// A period only separates chapter and verse when a digit follows it directly.
	{
		kind: "period",
		re: new RegExp(`^(\\d+)\\.(\\d+)(?:${DASH}(\\d+))?${MARKER}$`),
	},
	{ kind: "chapter", re: new RegExp(`^(\\d+)${MARKER}$`) },
];

// Single word, optionally numbered ("Xyz", "2 Abc"), for books the lexicon lacks.
const UNKNOWN_BOOK_RE = /^(?:[1-3]\s?)?[A-Za-z]+(?![A-Za-z])/;
const BOOK_SEPARATOR_RE = /^[.,]?\s*/;
const DIGITS_RE = /^\d+$/;

/** Positive safe integer from a digit string, or null. */
export function toPositiveInteger(raw: string | undefined): number | null {
	if (raw === undefined || !DIGITS_RE.test(raw)) return null;
	const value = Number.parseInt(raw, 10);
	if (!Number.isSafeInteger(value) || value <= 0) return null;
	return value;
}

function isMarker(value: string | undefined): value is CitationMarker {
	return value === "*" || value === "#";
}

/**
 * The captured marker, else the first `*` or `#` anywhere in the raw text.
 */
export function detectMarker(
	captured: string | undefined,
	raw: string,
): CitationMarker | undefined {
	if (isMarker(captured)) return captured;
	const found = raw.match(/[*#]/)?.[0];
	return isMarker(found) ? found : undefined;
}

export function buildLocator(
	kind: LocatorKind,
	chapterRaw: string | undefined,
	verseRaw: string | undefined,
	endRaw: string | undefined,
	markerRaw: string | undefined,
	raw: string,
): ParsedLocator | null {
	const chapter = toPositiveInteger(chapterRaw);
	if (chapter === null) return null;

	let verseStart = 1;
	if (verseRaw !== undefined) {
		const verse = toPositiveInteger(verseRaw);
		if (verse === null) return null;
		verseStart = verse;
	}

	const locator: ParsedLocator = { kind, chapter, verseStart };
	if (endRaw !== undefined) {
		const verseEnd = toPositiveInteger(endRaw);
		if (verseEnd === null) return null;
		locator.verseEnd = verseEnd;
	}

	const marker = detectMarker(markerRaw, raw);
	if (marker) {
		locator.marker = marker;
	}
	return locator;
}

/**
 * Parse a book-less locator ("3:16-18*", "13.4", "23#"). The whole string
 * must be consumed.
 */
export function parseLocator(raw: string): ParsedLocator | null {
	const text = raw.trim();
	for (const { kind, re } of LOCATOR_PATTERNS) {
		const match = re.exec(text);
		if (!match) continue;
		if (kind === "chapter") {
			return buildLocator(kind, match[1], undefined, undefined, match[2], text);
		}
		return buildLocator(kind, match[1], match[2], match[3], match[4], text);
	}
	return null;
}

export function toReference(
	book: string,
	bookKnown: boolean,
	locator: ParsedLocator,
): ParsedReference {
	const reference: ParsedReference = {
		book,
		bookKnown,
		chapter: locator.chapter,
		verseStart: locator.verseStart,
	};
	if (locator.verseEnd !== undefined) reference.verseEnd = locator.verseEnd;
	if (locator.marker) reference.marker = locator.marker;
	return reference;
}

/**
 * Parse a complete reference ("1 Cor. 13.4-7", "Gal 3:27*", "Ps 23").
 *
 * The book is the longest lexicon key at the start of the text. Failing
 * that, a single unknown word is accepted as the book, but only when a verse
 * is given, so "room 4" is not mistaken for a citation.
 */
export function parseReference(raw: string): ParsedReference | null {
	const text = raw.trim();

	const knownBook = matchBookPrefix(text);
	if (knownBook) {
		const rest = text.slice(knownBook.length).replace(BOOK_SEPARATOR_RE, "");
		const locator = parseLocator(rest);
		if (!locator) return null;
		return toReference(resolveBook(knownBook), true, locator);
	}

	const unknownBook = UNKNOWN_BOOK_RE.exec(text)?.[0];
	if (!unknownBook) return null;
	const rest = text.slice(unknownBook.length).replace(BOOK_SEPARATOR_RE, "");
	const locator = parseLocator(rest);
	if (!locator || locator.kind === "chapter") return null;
	return toReference(resolveBook(unknownBook), false, locator);
}

export function formatReference(reference: ParsedReference): string {
	const range =
		reference.verseEnd !== undefined ? `-${reference.verseEnd}` : "";
	return `${reference.book} ${reference.chapter}:${reference.verseStart}${range}${reference.marker ?? ""}`;
}
