/**
 * Run tasks with at most `concurrency` in flight. Results keep task order.
 */
export async function promiseAllWithConcurrency<T>(
	tasks: ReadonlyArray<() => Promise<T>>,
	concurrency: number,
): Promise<T[]> {
	if (!Number.isInteger(concurrency) || concurrency <= 0) {
		throw new Error(`Invalid concurrency value: ${concurrency}`);
	}

	const results: T[] = new Array(tasks.length);
	let nextIndex = 0;

	const worker = async () => {
		while (true) {
			const currentIndex = nextIndex++;
			const task = tasks[currentIndex];
			if (task === undefined) {
				return;
			}
			results[currentIndex] = await task();
		}
	};

	await Promise.all(
		Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker()),
	);

	return results;
}
