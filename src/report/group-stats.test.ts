import { describe, expect, it } from "vitest";
import {
	addRecord,
	averagePnlByGroup,
	avgPnl,
	emptyGroupStats,
	groupSetRatio,
	setRatio,
} from "./group-stats.js";

describe("GroupStats", () => {
	it("starts zeroed", () => {
		expect(emptyGroupStats()).toEqual({ pnlSum: 0, qSetSum: 0, qReqSum: 0, count: 0 });
	});

	it("addRecord sums fields and counts the record", () => {
		const stats = emptyGroupStats();
		addRecord(stats, { pnlTotal: 5, qSet: 9, qReq: 10, bucket: "A", strategy: "X" });
		addRecord(stats, { pnlTotal: -2, qSet: 8, qReq: 10, bucket: "A", strategy: "Y" });

		expect(stats).toEqual({ pnlSum: 3, qSetSum: 17, qReqSum: 20, count: 2 });
	});

	describe("setRatio", () => {
		it("divides set by requested", () => {
			expect(setRatio(9, 10)).toBe(0.9);
		});

		it("is zero when nothing was requested", () => {
			expect(setRatio(5, 0)).toBe(0);
		});

		it("is zero when requested sum is negative", () => {
			expect(setRatio(5, -1)).toBe(0);
		});

		it("is not clamped when fills exceed requests", () => {
			expect(setRatio(12, 10)).toBe(1.2);
		});

		it("groupSetRatio reads the group sums", () => {
			expect(groupSetRatio({ pnlSum: 0, qSetSum: 17, qReqSum: 20, count: 2 })).toBe(0.85);
		});
	});

	describe("avgPnl", () => {
		it("is pnl per record", () => {
			expect(avgPnl({ pnlSum: 3, qSetSum: 0, qReqSum: 0, count: 2 })).toBe(1.5);
		});

		it("is zero for an empty group", () => {
			expect(avgPnl(emptyGroupStats())).toBe(0);
		});
	});

	describe("averagePnlByGroup", () => {
		it("maps each label to its mean PnL", () => {
			const groups = new Map([
				["A", { pnlSum: 3, qSetSum: 17, qReqSum: 20, count: 2 }],
				["B", { pnlSum: 10, qSetSum: 10, qReqSum: 10, count: 1 }],
			]);

			expect(averagePnlByGroup(groups)).toEqual({ A: 1.5, B: 10 });
		});

		it("is empty for no groups", () => {
			expect(averagePnlByGroup(new Map())).toEqual({});
		});
	});
});
