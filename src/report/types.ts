/** One shadow-simulated trade, as read from a shadow log row. */
export interface TradeRecord {
	readonly pnlTotal: number;
	/** Quantity set (filled) across legs */
	readonly qSet: number;
	/** Quantity requested */
	readonly qReq: number;
	readonly bucket: string;
	readonly strategy: string;
}

/** Running totals for one group of records. */
export interface GroupStats {
	pnlSum: number;
	qSetSum: number;
	qReqSum: number;
	count: number;
}

/** Immutable snapshot produced once all records are folded in. */
export interface Summary {
	readonly rowCount: number;
	readonly totalPnl: number;
	readonly totalQSet: number;
	readonly totalQReq: number;
	/** Every pnlTotal, ascending */
	readonly sortedPnl: readonly number[];
	readonly byBucket: ReadonlyMap<string, Readonly<GroupStats>>;
	readonly byStrategy: ReadonlyMap<string, Readonly<GroupStats>>;
}

/** Promotion gate outcome. */
export const Decision = {
	Go: "GO",
	NoGo: "NO_GO",
} as const;

export type Decision = (typeof Decision)[keyof typeof Decision];

export interface Verdict {
	readonly decision: Decision;
	readonly setRatio: number;
	/** Human-readable pass/fail line per rule, in evaluation order */
	readonly reasons: readonly string[];
}
