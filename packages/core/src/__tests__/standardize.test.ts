import { describe, expect, it } from "vitest";
import { collectDiagnostics } from "../lib/diagnostics";
import {
	applyEdits,
	findCitationEdits,
	getPatterns,
	standardizeText,
} from "../lib/standardize";

describe("standardizeText", () => {
	it.each([
		["Acts 2:12:16", "Acts 2:12-16"],
		["1 Cor. 13.4-7", "1 Corinthians 13:4-7"],
		["Isa. 53.5-6", "Isaiah 53:5-6"],
		["Psalm 23", "Psalm 23:1"],
		["John chapter 3 verse 16", "John 3:16"],
		["Luke chapter 2 verses 1-7", "Luke 2:1-7"],
		["Acts chapter 2 verses 38 through 40", "Acts 2:38-40"],
		["John chapter 3", "John 3:1"],
		["Matt 5 3-10", "Matthew 5:3-10"],
		["Song of Solomon 2 3", "Song of Solomon 2:3"],
		["Rom 8:28–30", "Romans 8:28-30"],
		["1John 4:8", "1 John 4:8"],
		["Jn 3:16", "John 3:16"],
	])("rewrites %s", (input, expected) => {
		expect(standardizeText(input)).toBe(expected);
	});

	it("rewrites parenthesized lists", () => {
		expect(standardizeText("(Gal 3:27, 4:1)")).toBe(
			"(Galatians 3:27, Galatians 4:1)",
		);
		expect(standardizeText("(mt 4:23, mk 1:14-15)")).toBe(
			"(Matthew 4:23, Mark 1:14-15)",
		);
		expect(standardizeText("(1 jn 4:7-8, 2 jn 5-6, 3 jn 11)")).toBe(
			"(1 John 4:7-8, 2 jn 5-6, 3 John 11:1)",
		);
		expect(standardizeText("(Ps 23, 24)")).toBe("(Psalm 23:1, Psalm 24:1)");
	});

	it("keeps markers attached", () => {
		expect(standardizeText("(Gal. 3:27*, Eph. 4:24*, Col. 3:10*)")).toBe(
			"(Galatians 3:27*, Ephesians 4:24*, Colossians 3:10*)",
		);
		expect(standardizeText("In Rom. 1:16*, Paul")).toBe(
			"In Romans 1:16*, Paul",
		);
		expect(standardizeText("Ps 23#")).toBe("Psalm 23:1#");
	});

	it("leaves text that is not a citation alone", () => {
		for (const text of [
			"jn 3:16",
			"John 3:16-4:2",
			"John 5:10-3",
			"(see above)",
			"(a,b)",
			"Call me at 5:30 (room 4, floor 2).",
			"This is 5:30 and he 3 times",
			"John\n3 people",
			"Xyz 3:16",
			"This is chapter 3 of the manual.",
			"It is chapter 12, verse 4 of the statute.",
			"He 3 times",
			"Is 2 enough?",
		]) {
			expect(standardizeText(text)).toBe(text);
		}
	});

	it("reads sentence-initial word keys as books only before a verse", () => {
		expect(standardizeText("He 3:1 and Is 53:5")).toBe(
			"Hebrews 3:1 and Isaiah 53:5",
		);
		expect(standardizeText("Heb 3")).toBe("Hebrews 3:1");
	});

	it("rewrites double-colon ranges inside parentheses", () => {
		expect(standardizeText("(Gen 1:1, 2:3:4)")).toBe(
			"(Genesis 1:1, Genesis 2:3-4)",
		);
	});

	it("never changes text without digits", () => {
		const text = "Genesis is a book. He read Job and Acts (twice), then Ruth.";
		expect(standardizeText(text)).toBe(text);
	});

	it("is idempotent", () => {
		const inputs = [
			"See Gal. 3:27* and Psalm 23.",
			"(Gal 3:27, 4:1) then Acts 2:12:16 and 1 Cor. 13.4-7",
			"John chapter 3 verse 16; (1 jn 4:7-8, 2 jn 5-6, 3 jn 11)",
			"Matt 5 3-10 and Song of Solomon 2 3",
		];
		for (const input of inputs) {
			const once = standardizeText(input);
			expect(standardizeText(once)).toBe(once);
		}
	});

	it("reports invalid spans and leaves them unchanged", () => {
		const { sink, diagnostics } = collectDiagnostics();
		expect(standardizeText("John 0:5", { onDiagnostic: sink })).toBe(
			"John 0:5",
		);
		expect(diagnostics.map((diagnostic) => diagnostic.kind)).toEqual([
			"unparseable-span",
		]);
	});

	it("title-cases unknown books only inside lists", () => {
		const { sink, diagnostics } = collectDiagnostics();
		expect(standardizeText("(xyz 3:16)", { onDiagnostic: sink })).toBe(
			"(Xyz 3:16)",
		);
		expect(diagnostics.map((diagnostic) => diagnostic.kind)).toEqual([
			"unknown-book",
			"rewritten",
		]);
	});
});

describe("findCitationEdits", () => {
	it("returns changed spans with offsets into the input", () => {
		expect(findCitationEdits("See Gal. 3:27* and Psalm 23")).toEqual([
			{
				start: 4,
				end: 14,
				original: "Gal. 3:27*",
				replacement: "Galatians 3:27*",
				dialect: "colon",
			},
			{
				start: 19,
				end: 27,
				original: "Psalm 23",
				replacement: "Psalm 23:1",
				dialect: "standalone-chapter",
			},
		]);
	});

	it("gives spans that slice back to their original text", () => {
		const text = "Read (Ps 23, 24), Rom 8:28-30 and Luke chapter 2 verses 1-7.";
		const edits = findCitationEdits(text);
		expect(edits).toHaveLength(3);
		for (const edit of edits) {
			expect(text.slice(edit.start, edit.end)).toBe(edit.original);
		}
		expect(edits.map((edit) => edit.dialect)).toEqual([
			"parenthesized-group",
			"colon",
			"verbose",
		]);
	});

	it("omits citations already in canonical form", () => {
		expect(findCitationEdits("John 3:16 and Psalm 23:1")).toEqual([]);
	});
});

describe("applyEdits", () => {
	it("splices edits in offset order", () => {
		const text = "ab cd";
		expect(
			applyEdits(text, [
				{ start: 3, end: 5, original: "cd", replacement: "CD", dialect: "colon" },
				{ start: 0, end: 2, original: "ab", replacement: "AB", dialect: "colon" },
			]),
		).toBe("AB CD");
	});

	it("rejects overlapping edits", () => {
		expect(() =>
			applyEdits("abcdef", [
				{ start: 0, end: 4, original: "abcd", replacement: "x", dialect: "colon" },
				{ start: 2, end: 6, original: "cdef", replacement: "y", dialect: "colon" },
			]),
		).toThrow("Overlapping edits at 2");
	});
});

describe("getPatterns", () => {
	it("lists the dialects in precedence order", () => {
		expect(getPatterns().map((matcher) => matcher.id)).toEqual([
			"parenthesized-group",
			"double-colon",
			"period",
			"verbose",
			"colon",
			"space",
			"standalone-chapter",
		]);
	});

	it("returns a fresh RegExp on every call", () => {
		const [first] = getPatterns();
		const [second] = getPatterns();
		expect(first?.pattern).not.toBe(second?.pattern);
	});

	it("rewrites a match on its own", () => {
		const colon = getPatterns().find((matcher) => matcher.id === "colon");
		const match = colon?.pattern.exec("see Jn 3:16 today");
		expect(match).toBeTruthy();
		if (!colon || !match) return;
		expect(match[0]).toBe("Jn 3:16");
		expect(colon.rewrite(match)).toBe("John 3:16");
	});

	it("returns null for matches it declines", () => {
		const colon = getPatterns().find((matcher) => matcher.id === "colon");
		const match = colon?.pattern.exec("this is 5:30");
		if (!colon || !match) throw new Error("expected a colon match");
		expect(colon.rewrite(match)).toBe(null);
	});
});
