/**
 * ShadowAggregator — single-pass accumulation of shadow trade records.
 *
 * Keeps three views of the same stream: global totals, per-bucket and
 * per-strategy GroupStats. The full PnL list is retained for the tail
 * percentile. Group entries are created on first sight of a label.
 */
import { addRecord, emptyGroupStats } from "./group-stats.js";
import type { GroupStats, Summary, TradeRecord } from "./types.js";

/** Summary of an input with no rows; each call owns its maps. */
export function emptySummary(): Summary {
	return {
		rowCount: 0,
		totalPnl: 0,
		totalQSet: 0,
		totalQReq: 0,
		sortedPnl: [],
		byBucket: new Map<string, GroupStats>(),
		byStrategy: new Map<string, GroupStats>(),
	};
}

export class ShadowAggregator {
	private readonly global = emptyGroupStats();
	private readonly pnls: number[] = [];
	private readonly byBucket = new Map<string, GroupStats>();
	private readonly byStrategy = new Map<string, GroupStats>();

	get rowCount(): number {
		return this.global.count;
	}

	add(record: TradeRecord): void {
		addRecord(this.global, record);
		this.pnls.push(record.pnlTotal);
		addRecord(entryFor(this.byBucket, record.bucket), record);
		addRecord(entryFor(this.byStrategy, record.strategy), record);
	}

	/** Immutable view of everything added so far; later adds do not leak into it. */
	snapshot(): Summary {
		if (this.global.count === 0) {
			return emptySummary();
		}

		return {
			rowCount: this.global.count,
			totalPnl: this.global.pnlSum,
			totalQSet: this.global.qSetSum,
			totalQReq: this.global.qReqSum,
			sortedPnl: [...this.pnls].sort((a, b) => a - b),
			byBucket: copyGroups(this.byBucket),
			byStrategy: copyGroups(this.byStrategy),
		};
	}
}

/** Aggregates a finite, already-materialized sequence of records. */
export function aggregate(records: Iterable<TradeRecord>): Summary {
	const aggregator = new ShadowAggregator();
	for (const record of records) {
		aggregator.add(record);
	}
	return aggregator.snapshot();
}

/** Aggregates records as a reader yields them; rejects with the reader's first error. */
export async function aggregateStream(records: AsyncIterable<TradeRecord>): Promise<Summary> {
	const aggregator = new ShadowAggregator();
	for await (const record of records) {
		aggregator.add(record);
	}
	return aggregator.snapshot();
}

function entryFor(groups: Map<string, GroupStats>, key: string): GroupStats {
	const existing = groups.get(key);
	if (existing !== undefined) {
		return existing;
	}
	const created = emptyGroupStats();
	groups.set(key, created);
	return created;
}

function copyGroups(groups: ReadonlyMap<string, GroupStats>): Map<string, GroupStats> {
	const copy = new Map<string, GroupStats>();
	for (const [key, stats] of groups) {
		copy.set(key, { ...stats });
	}
	return copy;
}
