import type { GroupStats, TradeRecord } from "./types.js";

export function emptyGroupStats(): GroupStats {
	return { pnlSum: 0, qSetSum: 0, qReqSum: 0, count: 0 };
}

/** Folds one record into the accumulator in place. */
export function addRecord(stats: GroupStats, record: TradeRecord): void {
	stats.pnlSum += record.pnlTotal;
	stats.qSetSum += record.qSet;
	stats.qReqSum += record.qReq;
	stats.count += 1;
}

/**
 * Aggregate fill ratio, sum-of-sums rather than average-of-ratios.
 * Zero when nothing was requested; not clamped, fills above the request give a ratio above 1.
 */
export function setRatio(qSetSum: number, qReqSum: number): number {
	return qReqSum > 0 ? qSetSum / qReqSum : 0;
}

export function groupSetRatio(stats: Readonly<GroupStats>): number {
	return setRatio(stats.qSetSum, stats.qReqSum);
}

/** Mean PnL per record, 0 for an empty group. */
export function avgPnl(stats: Readonly<GroupStats>): number {
	return stats.count > 0 ? stats.pnlSum / stats.count : 0;
}

/** Mean PnL per label, in the map's insertion order. */
export function averagePnlByGroup(
	groups: ReadonlyMap<string, Readonly<GroupStats>>,
): Record<string, number> {
	return Object.fromEntries([...groups].map(([key, stats]) => [key, avgPnl(stats)]));
}
