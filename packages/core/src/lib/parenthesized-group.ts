import { lookupBook, matchBookPrefix } from "./book-lexicon";
import { ignoreDiagnostics } from "./diagnostics";
import {
	formatReference,
	parseLocator,
	parseReference,
	toReference,
} from "./reference-parser";
import type { DiagnosticSink, ParsedReference } from "./types";

export type GroupItemStatus = "resolved" | "carried" | "verbatim";

export interface GroupItem {
	source: string;
	output: string;
	status: GroupItemStatus;
	reference?: ParsedReference;
}

export interface GroupResolution {
	text: string;
	resolvedCount: number;
	items: GroupItem[];
}

export interface GroupContext {
	report?: DiagnosticSink;
	/** Offset of the interior in the surrounding text, for diagnostics. */
	offset?: number;
}

export function normalizeGroupInterior(interior: string): string {
	return interior.replace(/\s+/g, " ").replace(/:{2,}/g, ":").trim();
}

/**
 * Split a normalized interior on commas. A comma right after a bare book
 * abbreviation and before a digit ("Gal, 3:27") belongs to that reference
 * and is read as a space. This is a heuristic, not a grammar.
 */
export function splitGroupItems(interior: string): string[] {
	const parts = interior
		.split(",")
		.map((part) => part.trim())
		.filter((part) => part.length > 0);

	const items: string[] = [];
	for (let index = 0; index < parts.length; index += 1) {
		const part = parts[index];
		const next = parts[index + 1];
		if (next !== undefined && /^\d/.test(next) && lookupBook(part) !== null) {
			items.push(`${part} ${next}`);
			index += 1;
			continue;
		}
		items.push(part);
	}
	return items;
}

/**
 * Resolve the interior of a parenthesized list of references. Items without
 * a book of their own inherit the book of the last resolved item; items that
 * still do not parse are kept as written.
 */
export function resolveGroup(
	interior: string,
	context: GroupContext = {},
): GroupResolution {
	const report = context.report ?? ignoreDiagnostics;
	const items: GroupItem[] = [];
	let previous: ParsedReference | null = null;

	for (const source of splitGroupItems(normalizeGroupInterior(interior))) {
		const reference = parseReference(source);
		if (reference) {
			if (!reference.bookKnown) {
				report({
					kind: "unknown-book",
					level: "info",
					message: `Unknown book "${reference.book}", kept title-cased`,
					text: source,
					offset: context.offset,
				});
			}
			previous = reference;
			items.push({
				source,
				output: formatReference(reference),
				status: "resolved",
				reference,
			});
			continue;
		}

		if (previous && matchBookPrefix(source) === null) {
			const locator = parseLocator(source);
			if (locator) {
				const carried = toReference(previous.book, previous.bookKnown, locator);
				items.push({
					source,
					output: formatReference(carried),
					status: "carried",
					reference: carried,
				});
				continue;
			}
		}

		report({
			kind: "unresolved-group-item",
			level: "warn",
			message: "Could not parse reference in list, kept as written",
			text: source,
			offset: context.offset,
		});
		items.push({ source, output: source, status: "verbatim" });
	}

	return {
		text: items.map((item) => item.output).join(", "),
		resolvedCount: items.filter((item) => item.status !== "verbatim").length,
		items,
	};
}
