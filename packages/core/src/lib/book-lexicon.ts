import bookData from "../data/books.json";

interface BooksData {
	books: Record<string, string[]>;
}

const books = (bookData as BooksData).books;

const NUMBERED_PREFIX_RE = /^([1-3])\s*(?=[a-z])/;
const TRAILING_PUNCT_RE = /[.,;\s]+$/;

/**
 * Lower-case, collapse whitespace, strip trailing punctuation and make the
 * space after a leading book number explicit ("1Cor." -> "1 cor").
 */
export function normalizeBookKey(raw: string): string {
	return raw
		.toLowerCase()
		.replace(/\s+/g, " ")
		.trim()
		.replace(TRAILING_PUNCT_RE, "")
		.replace(NUMBERED_PREFIX_RE, "$1 ");
}

function buildLexicon(): ReadonlyMap<string, string> {
	const lexicon = new Map<string, string>();
	for (const [name, abbreviations] of Object.entries(books)) {
		for (const key of [name, ...abbreviations]) {
			const normalized = normalizeBookKey(key);
			const existing = lexicon.get(normalized);
			if (existing && existing !== name) {
				throw new Error(
					`Book key "${normalized}" maps to both ${existing} and ${name}`,
				);
			}
			lexicon.set(normalized, name);
		}
	}
	return lexicon;
}

const LEXICON = buildLexicon();

export function lookupBook(raw: string): string | null {
	return LEXICON.get(normalizeBookKey(raw)) ?? null;
}

export function isKnownBook(raw: string): boolean {
	return LEXICON.has(normalizeBookKey(raw));
}

function titleCase(value: string): string {
	return value
		.split(" ")
		.map((word) => word.charAt(0).toUpperCase() + word.slice(1))
		.join(" ");
}

/**
 * Canonical book name for an abbreviation. Unknown abbreviations come back
 * title-cased rather than rejected.
 */
export function resolveBook(raw: string): string {
	const normalized = normalizeBookKey(raw);
	return LEXICON.get(normalized) ?? titleCase(normalized);
}

export function listBookKeys(): string[] {
	return [...LEXICON.keys()];
}

export function listCanonicalBooks(): string[] {
	return Object.keys(books);
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Horizontal whitespace only: a book name never continues onto the next line.
const GAP = "[ \\t\\u00a0]";

function keyToPattern(key: string): string {
	const numbered = key.match(/^([1-3]) (.+)$/);
	if (numbered) {
		return `${numbered[1]}${GAP}*${keyToPattern(numbered[2])}`;
	}
	return key.split(" ").map(escapeRegExp).join(`${GAP}+`);
}

/**
 * Alternation over every lexicon key, longest first, so "1 Cor" is tried
 * before "1 Co" and "Song of Solomon" before "Song". Compile with the `i`
 * flag.
 */
export const bookPatternSource = [...LEXICON.keys()]
	.sort((a, b) => b.length - a.length || a.localeCompare(b))
	.map(keyToPattern)
	.join("|");

const BOOK_PREFIX_RE = new RegExp(`^(?:${bookPatternSource})(?![A-Za-z])`, "i");

/** Longest lexicon key at the very start of `text`, as written there. */
export function matchBookPrefix(text: string): string | null {
	const match = BOOK_PREFIX_RE.exec(text);
	return match ? match[0] : null;
}
