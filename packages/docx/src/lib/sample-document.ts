import sampleData from "../data/sample-document.json";
import { escapeXmlText } from "./word-xml";
import { writeZipEntries } from "./zip-utils";

interface SampleRun {
	text: string;
	bold?: boolean;
}

interface SampleContent {
	title: string;
	intro: string;
	sections: Array<{ heading: string; paragraphs: string[] }>;
	table: string[][];
	footnote: string;
	splitRuns: SampleRun[];
}

const content: SampleContent = sampleData;

const WORD_NS =
	'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';
const XML_DECLARATION =
	'<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

const CONTENT_TYPES = `${XML_DECLARATION}
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/><Default Extension="xml" ContentType="application/xml"/><Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/><Override PartName="/word/footnotes.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.footnotes+xml"/></Types>`;

const PACKAGE_RELS = `${XML_DECLARATION}
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/></Relationships>`;

const DOCUMENT_RELS = `${XML_DECLARATION}
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/footnotes" Target="footnotes.xml"/></Relationships>`;

function textRun(run: SampleRun): string {
	const props = run.bold ? "<w:rPr><w:b/></w:rPr>" : "";
	const space = /^\s|\s$/.test(run.text) ? ' xml:space="preserve"' : "";
	return `<w:r>${props}<w:t${space}>${escapeXmlText(run.text)}</w:t></w:r>`;
}

function paragraph(runs: SampleRun[], style?: string): string {
	const props = style ? `<w:pPr><w:pStyle w:val="${style}"/></w:pPr>` : "";
	return `<w:p>${props}${runs.map(textRun).join("")}</w:p>`;
}

function table(rows: string[][]): string {
	const body = rows
		.map(
			(cells) =>
				`<w:tr>${cells.map((cell) => `<w:tc>${paragraph([{ text: cell }])}</w:tc>`).join("")}</w:tr>`,
		)
		.join("");
	return `<w:tbl>${body}</w:tbl>`;
}

function documentXml(): string {
	const body = [
		paragraph([{ text: content.title }], "Title"),
		paragraph([{ text: content.intro }]),
		...content.sections.flatMap((section) => [
			paragraph([{ text: section.heading }], "Heading1"),
			...section.paragraphs.map((text) => paragraph([{ text }])),
		]),
		paragraph(content.splitRuns),
		table(content.table),
		`<w:p>${textRun({ text: "See the note." })}<w:r><w:footnoteReference w:id="1"/></w:r></w:p>`,
	].join("");
	return `${XML_DECLARATION}\n<w:document ${WORD_NS}><w:body>${body}</w:body></w:document>`;
}

function footnotesXml(): string {
	return `${XML_DECLARATION}\n<w:footnotes ${WORD_NS}><w:footnote w:type="separator" w:id="-1"><w:p><w:r><w:separator/></w:r></w:p></w:footnote><w:footnote w:type="continuationSeparator" w:id="0"><w:p><w:r><w:continuationSeparator/></w:r></w:p></w:footnote><w:footnote w:id="1">${paragraph([{ text: content.footnote }])}</w:footnote></w:footnotes>`;
}

/**
 * A small .docx with one paragraph per citation style, a table cell and a
 * footnote.
 */
export async function buildSampleDocument(): Promise<Uint8Array> {
	const encoder = new TextEncoder();
	const parts: Array<[string, string]> = [
		["[Content_Types].xml", CONTENT_TYPES],
		["_rels/.rels", PACKAGE_RELS],
		["word/document.xml", documentXml()],
		["word/_rels/document.xml.rels", DOCUMENT_RELS],
		["word/footnotes.xml", footnotesXml()],
	];
	return writeZipEntries(
		parts.map(([filename, xml]) => ({ filename, data: encoder.encode(xml) })),
	);
}
