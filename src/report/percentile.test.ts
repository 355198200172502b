import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { percentile } from "./percentile.js";

describe("percentile", () => {
	it("returns 0 for an empty list at any p", () => {
		expect(percentile([], 0)).toBe(0);
		expect(percentile([], 0.01)).toBe(0);
		expect(percentile([], 1)).toBe(0);
	});

	it("returns the minimum at p = 0 and below", () => {
		expect(percentile([-3, 1, 7], 0)).toBe(-3);
		expect(percentile([-3, 1, 7], -0.5)).toBe(-3);
	});

	it("returns the maximum at p = 1 and above", () => {
		expect(percentile([-3, 1, 7], 1)).toBe(7);
		expect(percentile([-3, 1, 7], 2)).toBe(7);
	});

	it("floors the rank: 1% of four values is the first", () => {
		expect(percentile([1, 2, 3, 4], 0.01)).toBe(1);
	});

	it("does not interpolate between ranks", () => {
		// floor(0.5 * 3) = 1
		expect(percentile([1, 2, 3, 4], 0.5)).toBe(2);
		// floor(0.99 * 3) = 2
		expect(percentile([1, 2, 3, 4], 0.99)).toBe(3);
	});

	it("reaches the second element at 1% once there are 101 values", () => {
		const values = Array.from({ length: 101 }, (_, i) => i * 10);
		expect(percentile(values, 0.01)).toBe(10);
		expect(percentile(values.slice(0, 100), 0.01)).toBe(0);
	});

	it("returns the only element of a single-value list", () => {
		expect(percentile([42], 0.01)).toBe(42);
	});

	describe("property-based", () => {
		const sortedArb = fc
			.array(fc.integer({ min: -1_000, max: 1_000 }), { minLength: 1, maxLength: 200 })
			.map((xs) => xs.sort((a, b) => a - b));

		it("always returns an element between min and max", () => {
			fc.assert(
				fc.property(sortedArb, fc.double({ min: 0, max: 1, noNaN: true }), (xs, p) => {
					const v = percentile(xs, p);
					expect(xs).toContain(v);
					expect(v).toBeGreaterThanOrEqual(xs[0] ?? 0);
					expect(v).toBeLessThanOrEqual(xs[xs.length - 1] ?? 0);
				}),
			);
		});

		it("is monotonic in p", () => {
			fc.assert(
				fc.property(
					sortedArb,
					fc.double({ min: 0, max: 1, noNaN: true }),
					fc.double({ min: 0, max: 1, noNaN: true }),
					(xs, a, b) => {
						const [lo, hi] = a <= b ? [a, b] : [b, a];
						expect(percentile(xs, lo)).toBeLessThanOrEqual(percentile(xs, hi));
					},
				),
			);
		});
	});
});
