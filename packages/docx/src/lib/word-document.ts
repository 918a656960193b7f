import { readFile } from "node:fs/promises";
import { diffText, distributeEdits, type TextEdit } from "./text-blocks";
import { rewriteRuns, scanParagraphs, type TextRunSlot } from "./word-xml";
import {
	readZipEntries,
	writeZipEntries,
	type ZipFileEntry,
} from "./zip-utils";

const MAIN_PART = "word/document.xml";

function partRank(name: string): number | null {
	if (name === MAIN_PART) return 0;
	if (name === "word/footnotes.xml") return 1;
	if (name === "word/endnotes.xml") return 2;
	if (/^word\/header\d*\.xml$/.test(name)) return 3;
	if (/^word\/footer\d*\.xml$/.test(name)) return 4;
	return null;
}

interface RunState {
	slot: TextRunSlot;
	text: string;
}

/**
 * One paragraph's text. Edits are written back into its `w:t` runs, never
 * across paragraph boundaries.
 */
export class TextBlock {
	constructor(
		readonly part: string,
		private readonly runs: RunState[],
	) {}

	get runTexts(): string[] {
		return this.runs.map((run) => run.text);
	}

	get text(): string {
		return this.runTexts.join("");
	}

	get changed(): boolean {
		return this.runs.some((run) => run.text !== run.slot.text);
	}

	changedRuns(): RunState[] {
		return this.runs.filter((run) => run.text !== run.slot.text);
	}

	/** Apply non-overlapping edits given in offsets of `text`. */
	applyEdits(edits: readonly TextEdit[]): void {
		const next = distributeEdits(this.runTexts, edits);
		next.forEach((text, index) => {
			const run = this.runs[index];
			if (run) run.text = text;
		});
	}

	setText(text: string): void {
		const edit = diffText(this.text, text);
		if (edit) this.applyEdits([edit]);
	}
}

class DocumentPart {
	readonly blocks: TextBlock[];

	constructor(
		readonly name: string,
		private readonly xml: string,
	) {
		this.blocks = scanParagraphs(xml).map(
			(paragraph) =>
				new TextBlock(
					name,
					paragraph.runs.map((slot) => ({ slot, text: slot.text })),
				),
		);
	}

	get changed(): boolean {
		return this.blocks.some((block) => block.changed);
	}

	serialize(): string {
		const changes = this.blocks.flatMap((block) => block.changedRuns());
		return rewriteRuns(this.xml, changes);
	}
}

/**
 * A .docx package opened for text edits. Parts other than the text parts
 * are carried through untouched.
 */
export class WordDocument {
	private constructor(
		private readonly entries: ZipFileEntry[],
		private readonly parts: Map<string, DocumentPart>,
	) {}

	static async load(bytes: Uint8Array): Promise<WordDocument> {
		const entries = await readZipEntries(bytes);
		const decoder = new TextDecoder("utf-8");
		const textParts = entries
			.map((entry) => ({ entry, rank: partRank(entry.filename) }))
			.filter(
				(item): item is { entry: ZipFileEntry; rank: number } =>
					item.rank !== null,
			)
			.sort(
				(a, b) =>
					a.rank - b.rank ||
					a.entry.filename.localeCompare(b.entry.filename, undefined, {
						numeric: true,
					}),
			);

		if (!textParts.some((item) => item.entry.filename === MAIN_PART)) {
			throw new Error(`Not a Word document: ${MAIN_PART} is missing`);
		}

		const parts = new Map<string, DocumentPart>();
		for (const { entry } of textParts) {
			parts.set(
				entry.filename,
				new DocumentPart(entry.filename, decoder.decode(entry.data)),
			);
		}
		return new WordDocument(entries, parts);
	}

	static async open(path: string): Promise<WordDocument> {
		return WordDocument.load(await readFile(path));
	}

	/** Text blocks of every text part, body first. */
	blocks(): TextBlock[] {
		return [...this.parts.values()].flatMap((part) => part.blocks);
	}

	get changed(): boolean {
		return [...this.parts.values()].some((part) => part.changed);
	}

	async save(): Promise<Uint8Array> {
		const encoder = new TextEncoder();
		const entries = this.entries.map((entry) => {
			const part = this.parts.get(entry.filename);
			if (!part || !part.changed) return entry;
			return {
				filename: entry.filename,
				data: encoder.encode(part.serialize()),
			};
		});
		return writeZipEntries(entries);
	}
}
