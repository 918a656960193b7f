/** A replacement of `[start, end)` in a block's concatenated run text. */
export interface TextEdit {
	start: number;
	end: number;
	replacement: string;
}

function findRunAt(
	runStarts: readonly number[],
	runTexts: readonly string[],
	offset: number,
): number {
	for (let index = 0; index < runTexts.length; index += 1) {
		const start = runStarts[index] ?? 0;
		if (offset >= start && offset < start + (runTexts[index]?.length ?? 0)) {
			return index;
		}
	}
	return runTexts.length - 1;
}

/**
 * Apply edits to text split across runs. Each replacement goes into the run
 * holding the edit's first character; the rest of the span is removed from
 * the runs it reaches into, so runs outside an edit keep their text and
 * their formatting.
 */
export function distributeEdits(
	runTexts: readonly string[],
	edits: readonly TextEdit[],
): string[] {
	if (edits.length === 0) return [...runTexts];
	if (runTexts.length === 0) {
		throw new Error("Cannot edit a block without text runs");
	}

	const runStarts: number[] = [];
	let total = 0;
	for (const text of runTexts) {
		runStarts.push(total);
		total += text.length;
	}

	const ordered = [...edits].sort((a, b) => a.start - b.start);
	for (let index = 1; index < ordered.length; index += 1) {
		const previous = ordered[index - 1];
		const current = ordered[index];
		if (previous && current && current.start < previous.end) {
			throw new Error(`Overlapping edits at ${current.start}`);
		}
	}

	const output = [...runTexts];
	// Right to left, so offsets inside each run stay valid for earlier edits.
	for (const edit of ordered.reverse()) {
		if (edit.start < 0 || edit.end > total || edit.end < edit.start) {
			throw new Error(`Edit [${edit.start}, ${edit.end}) is outside the text`);
		}
		const first = findRunAt(runStarts, runTexts, edit.start);
		for (let index = first; index < output.length; index += 1) {
			const runStart = runStarts[index] ?? 0;
			const runEnd = runStart + (runTexts[index]?.length ?? 0);
			if (index > first && runStart >= edit.end) break;

			const text = output[index] ?? "";
			const from = Math.max(edit.start - runStart, 0);
			const to = Math.min(edit.end, runEnd) - runStart;
			const inserted = index === first ? edit.replacement : "";
			output[index] =
				text.slice(0, from) + inserted + text.slice(Math.max(to, from));
		}
	}
	return output;
}

/**
 * The single replacement that turns `before` into `after`: everything
 * between their common prefix and common suffix.
 */
export function diffText(before: string, after: string): TextEdit | null {
	if (before === after) return null;
	let prefix = 0;
	const limit = Math.min(before.length, after.length);
	while (prefix < limit && before[prefix] === after[prefix]) prefix += 1;
	let suffix = 0;
	while (
		suffix < limit - prefix &&
		before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
	) {
		suffix += 1;
	}
	return {
		start: prefix,
		end: before.length - suffix,
		replacement: after.slice(prefix, after.length - suffix),
	};
}
