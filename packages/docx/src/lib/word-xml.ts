import { Parser } from "htmlparser2";

/** One `w:t` element of a part, located by offsets into the part's XML. */
export interface TextRunSlot {
	/** Offset of the `<` of the opening tag. */
	tagStart: number;
	/** Offset of the `>` that ends the opening (or self-closing) tag. */
	tagEnd: number;
	contentStart: number;
	contentEnd: number;
	selfClosing: boolean;
	preservesSpace: boolean;
	text: string;
}

/** Runs of one `w:p`, in order. Nested paragraphs are separate entries. */
export interface ParagraphSlot {
	/** Offset of the end of the opening tag, for ordering. */
	start: number;
	runs: TextRunSlot[];
}

const XML_ENTITIES: Record<string, string> = {
	"&amp;": "&",
	"&lt;": "<",
	"&gt;": ">",
	"&quot;": '"',
	"&apos;": "'",
};

/**
 * Decode the predefined XML entities and numeric character references
 */
export function decodeXmlEntities(text: string): string {
	return text.replace(
		/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g,
		(entity: string, body: string) => {
			if (body.startsWith("#x")) {
				return String.fromCodePoint(Number.parseInt(body.slice(2), 16));
			}
			if (body.startsWith("#")) {
				return String.fromCodePoint(Number.parseInt(body.slice(1), 10));
			}
			return XML_ENTITIES[entity] ?? entity;
		},
	);
}

export function escapeXmlText(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

/**
 * Locate every paragraph and its `w:t` runs. Paragraphs come back in
 * document order of their opening tags; paragraphs without text runs are
 * dropped.
 */
export function scanParagraphs(xml: string): ParagraphSlot[] {
	const paragraphs: ParagraphSlot[] = [];
	const paragraphStack: ParagraphSlot[] = [];
	let openRun: TextRunSlot | null = null;

	const parser = new Parser(
		{
			onopentag(name, attrs) {
				if (name === "w:p") {
					paragraphStack.push({ start: parser.endIndex, runs: [] });
					return;
				}
				if (name === "w:t") {
					openRun = {
						tagStart: xml.lastIndexOf("<", parser.endIndex),
						tagEnd: parser.endIndex,
						contentStart: parser.endIndex + 1,
						contentEnd: parser.endIndex + 1,
						selfClosing: false,
						preservesSpace: attrs["xml:space"] === "preserve",
						text: "",
					};
				}
			},
			onclosetag(name, isImplied) {
				if (name === "w:t" && openRun) {
					const run: TextRunSlot = openRun;
					openRun = null;
					if (isImplied) {
						run.selfClosing = true;
					} else {
						run.contentEnd = xml.lastIndexOf("<", parser.endIndex);
						run.text = decodeXmlEntities(
							xml.slice(run.contentStart, run.contentEnd),
						);
					}
					paragraphStack[paragraphStack.length - 1]?.runs.push(run);
					return;
				}
				if (name === "w:p") {
					const paragraph = paragraphStack.pop();
					if (paragraph && paragraph.runs.length > 0) {
						paragraphs.push(paragraph);
					}
				}
			},
		},
		{ xmlMode: true },
	);
	parser.write(xml);
	parser.end();

	return paragraphs.sort((a, b) => a.start - b.start);
}

function openTag(preserve: boolean): string {
	return preserve ? '<w:t xml:space="preserve">' : "<w:t>";
}

function needsPreserve(text: string): boolean {
	return /^\s|\s$/.test(text);
}

/**
 * Write new text into changed runs. Unchanged runs keep their exact bytes.
 */
export function rewriteRuns(
	xml: string,
	changes: ReadonlyArray<{ slot: TextRunSlot; text: string }>,
): string {
	const ordered = [...changes].sort(
		(a, b) => a.slot.tagStart - b.slot.tagStart,
	);
	let output = "";
	let cursor = 0;
	for (const { slot, text } of ordered) {
		const escaped = escapeXmlText(text);
		if (slot.selfClosing) {
			output += xml.slice(cursor, slot.tagStart);
			output += `${openTag(needsPreserve(text))}${escaped}</w:t>`;
			cursor = slot.tagEnd + 1;
			continue;
		}
		if (needsPreserve(text) && !slot.preservesSpace) {
			output += xml.slice(cursor, slot.tagEnd);
			output += ' xml:space="preserve">';
		} else {
			output += xml.slice(cursor, slot.contentStart);
		}
		output += escaped;
		cursor = slot.contentEnd;
	}
	return output + xml.slice(cursor);
}
