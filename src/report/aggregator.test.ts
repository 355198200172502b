import { describe, expect, it } from "vitest";
import { ShadowAggregator, aggregate, aggregateStream, emptySummary } from "./aggregator.js";
import type { TradeRecord } from "./types.js";

const rec = (
	pnlTotal: number,
	qSet: number,
	qReq: number,
	bucket: string,
	strategy: string,
): TradeRecord => ({ pnlTotal, qSet, qReq, bucket, strategy });

const SAMPLE: readonly TradeRecord[] = [
	rec(5, 9, 10, "A", "X"),
	rec(-2, 8, 10, "A", "Y"),
	rec(10, 10, 10, "B", "X"),
];

async function* yieldAll(records: readonly TradeRecord[]): AsyncGenerator<TradeRecord> {
	for (const r of records) {
		yield r;
	}
}

describe("ShadowAggregator", () => {
	describe("global totals", () => {
		it("sums pnl and quantities and counts rows", () => {
			const summary = aggregate(SAMPLE);

			expect(summary.rowCount).toBe(3);
			expect(summary.totalPnl).toBe(13);
			expect(summary.totalQSet).toBe(27);
			expect(summary.totalQReq).toBe(30);
		});

		it("keeps every pnl sorted ascending", () => {
			expect(aggregate(SAMPLE).sortedPnl).toEqual([-2, 5, 10]);
		});
	});

	describe("grouping", () => {
		it("accumulates per bucket", () => {
			const { byBucket } = aggregate(SAMPLE);

			expect(byBucket.size).toBe(2);
			expect(byBucket.get("A")).toEqual({ pnlSum: 3, qSetSum: 17, qReqSum: 20, count: 2 });
			expect(byBucket.get("B")).toEqual({ pnlSum: 10, qSetSum: 10, qReqSum: 10, count: 1 });
		});

		it("accumulates per strategy", () => {
			const { byStrategy } = aggregate(SAMPLE);

			expect(byStrategy.get("X")).toEqual({ pnlSum: 15, qSetSum: 19, qReqSum: 20, count: 2 });
			expect(byStrategy.get("Y")).toEqual({ pnlSum: -2, qSetSum: 8, qReqSum: 10, count: 1 });
		});

		it("treats labels as exact strings", () => {
			const { byBucket } = aggregate([rec(1, 1, 1, "liquid", "s"), rec(1, 1, 1, "Liquid", "s")]);

			expect([...byBucket.keys()]).toEqual(["liquid", "Liquid"]);
		});

		it("groups the empty label like any other", () => {
			const { byStrategy } = aggregate([rec(1, 1, 1, "A", ""), rec(2, 1, 1, "A", "")]);

			expect(byStrategy.get("")?.count).toBe(2);
		});
	});

	describe("empty input", () => {
		it("returns the degenerate summary", () => {
			const summary = aggregate([]);

			expect(summary).toEqual(emptySummary());
			expect(summary.rowCount).toBe(0);
			expect(summary.totalPnl).toBe(0);
			expect(summary.totalQSet).toBe(0);
			expect(summary.totalQReq).toBe(0);
			expect(summary.sortedPnl).toEqual([]);
			expect(summary.byBucket.size).toBe(0);
			expect(summary.byStrategy.size).toBe(0);
		});

		it("gives every empty snapshot its own maps", () => {
			const aggregator = new ShadowAggregator();
			const first = aggregator.snapshot();
			const second = aggregator.snapshot();

			expect(first.byBucket).not.toBe(second.byBucket);
			expect(first.byStrategy).not.toBe(second.byStrategy);
			expect(aggregate([]).byBucket).not.toBe(first.byBucket);
		});
	});

	describe("snapshot", () => {
		it("is not affected by later adds", () => {
			const aggregator = new ShadowAggregator();
			aggregator.add(SAMPLE[0] ?? rec(0, 0, 0, "", ""));
			const first = aggregator.snapshot();

			aggregator.add(rec(100, 1, 1, "A", "X"));

			expect(first.rowCount).toBe(1);
			expect(first.totalPnl).toBe(5);
			expect(first.sortedPnl).toEqual([5]);
			expect(first.byBucket.get("A")?.count).toBe(1);
			expect(aggregator.rowCount).toBe(2);
		});
	});

	describe("aggregateStream", () => {
		it("matches aggregate over the same records", async () => {
			const summary = await aggregateStream(yieldAll(SAMPLE));

			expect(summary.totalPnl).toBe(13);
			expect(summary.byBucket.get("A")?.count).toBe(2);
			expect(summary.sortedPnl).toEqual([-2, 5, 10]);
		});

		it("rejects with the source's error", async () => {
			async function* failing(): AsyncGenerator<TradeRecord> {
				yield rec(1, 1, 1, "A", "X");
				throw new Error("row 2 is broken");
			}

			await expect(aggregateStream(failing())).rejects.toThrow("row 2 is broken");
		});

		it("returns the degenerate summary for an empty source", async () => {
			expect(await aggregateStream(yieldAll([]))).toEqual(emptySummary());
		});
	});
});
