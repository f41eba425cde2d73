/**
 * Default number of packages resolved concurrently
 */
export const DEFAULT_CONCURRENCY = 20;

/**
 * Map over items with at most `concurrency` mapper calls in flight.
 *
 * Results keep the order of `items`, not completion order. The first
 * rejection stops dispatch of further items and rejects the returned
 * promise with that error; calls already in flight run to completion and
 * their results are discarded.
 *
 * @throws RangeError if `concurrency` is not a positive integer
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	concurrency: number,
	mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(
			`Concurrency must be a positive integer, got ${concurrency}`,
		);
	}

	const results = new Array<R>(items.length);
	let nextIndex = 0;
	let failed = false;

	const worker = async (): Promise<void> => {
		while (!failed && nextIndex < items.length) {
			const index = nextIndex++;
			try {
				results[index] = await mapper(items[index], index);
			} catch (error) {
				failed = true;
				throw error;
			}
		}
	};

	const workerCount = Math.min(concurrency, items.length);
	await Promise.all(Array.from({ length: workerCount }, () => worker()));
	return results;
}
