import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "./pool";

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
	it("should keep input order regardless of completion order", async () => {
		const results = await mapWithConcurrency([30, 10, 20], 3, async (ms) => {
			await delay(ms);
			return ms * 2;
		});
		expect(results).toEqual([60, 20, 40]);
	});

	it("should never exceed the concurrency limit", async () => {
		let active = 0;
		let peak = 0;
		const items = Array.from({ length: 12 }, (_, i) => i);

		await mapWithConcurrency(items, 3, async (item) => {
			active++;
			peak = Math.max(peak, active);
			await delay(5 + (item % 3));
			active--;
			return item;
		});

		expect(peak).toBe(3);
	});

	it("should return an empty list for no items", async () => {
		const results = await mapWithConcurrency([], 5, async () => 1);
		expect(results).toEqual([]);
	});

	it("should reject with the first error and stop dispatching", async () => {
		const started: number[] = [];
		const items = Array.from({ length: 10 }, (_, i) => i);

		await expect(
			mapWithConcurrency(items, 2, async (item) => {
				started.push(item);
				await delay(5);
				if (item === 1) {
					throw new Error("boom");
				}
				return item;
			}),
		).rejects.toThrow("boom");

		// Items 0 and 1 run together; after 1 fails no worker takes another item.
		// Worker 0 finishes item 0 at the same tick and may already hold item 2.
		expect(started.length).toBeLessThanOrEqual(3);
		expect(started.slice(0, 2)).toEqual([0, 1]);
	});

	it("should reject a non-positive concurrency", async () => {
		await expect(mapWithConcurrency([1], 0, async (x) => x)).rejects.toThrow(
			RangeError,
		);
		await expect(mapWithConcurrency([1], 1.5, async (x) => x)).rejects.toThrow(
			"Concurrency must be a positive integer, got 1.5",
		);
	});
});
