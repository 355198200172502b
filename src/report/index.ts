export {
	type TradeRecord,
	type GroupStats,
	type Summary,
	type Verdict,
	Decision,
} from "./types.js";
export {
	emptyGroupStats,
	addRecord,
	setRatio,
	groupSetRatio,
	avgPnl,
	averagePnlByGroup,
} from "./group-stats.js";
export { ShadowAggregator, emptySummary, aggregate, aggregateStream } from "./aggregator.js";
export { percentile } from "./percentile.js";
export { type DecisionThresholds, decide } from "./decision.js";
export { EMPTY_REPORT_LINES, formatReport, formatFixed, sortedKeys } from "./formatter.js";
export { type ShadowReport, buildReport } from "./report.js";
