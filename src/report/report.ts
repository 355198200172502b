import { DEFAULT_REPORT_CONFIG, type ReportConfig } from "../shared/config.js";
import { decide } from "./decision.js";
import { formatReport } from "./formatter.js";
import { percentile } from "./percentile.js";
import type { Summary, Verdict } from "./types.js";

export interface ShadowReport {
	readonly summary: Summary;
	readonly verdict: Verdict;
	/** PnL at the configured tail fraction of the sorted global distribution */
	readonly worstTailPnl: number;
	readonly lines: readonly string[];
}

/** Runs percentile, decision and formatting over an aggregated summary. */
export function buildReport(
	summary: Summary,
	config: ReportConfig = DEFAULT_REPORT_CONFIG,
): ShadowReport {
	const verdict = decide(summary, config);
	const worstTailPnl = percentile(summary.sortedPnl, config.tailFraction);
	return {
		summary,
		verdict,
		worstTailPnl,
		lines: formatReport(summary, verdict, worstTailPnl),
	};
}
