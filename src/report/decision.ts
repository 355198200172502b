/**
 * Promotion gate: GO only when the run made money and legs were filled
 * at or above the minimum set ratio. An empty run is always NO_GO.
 */
import { DEFAULT_REPORT_CONFIG, type ReportConfig } from "../shared/config.js";
import { setRatio } from "./group-stats.js";
import { Decision, type Summary, type Verdict } from "./types.js";

export type DecisionThresholds = Pick<ReportConfig, "minSetRatio" | "pnlThreshold">;

type GlobalTotals = Pick<Summary, "rowCount" | "totalPnl" | "totalQSet" | "totalQReq">;

export function decide(
	totals: GlobalTotals,
	thresholds: DecisionThresholds = DEFAULT_REPORT_CONFIG,
): Verdict {
	const ratio = setRatio(totals.totalQSet, totals.totalQReq);
	const pnlOk = totals.totalPnl > thresholds.pnlThreshold;
	const fillOk = ratio >= thresholds.minSetRatio;

	const reasons: string[] = [];
	if (totals.rowCount === 0) {
		reasons.push("no rows");
	}
	reasons.push(
		pnlOk
			? `TotalShadowPnL > ${thresholds.pnlThreshold}`
			: `TotalShadowPnL <= ${thresholds.pnlThreshold}`,
	);
	reasons.push(
		fillOk
			? `SetRatio >= ${thresholds.minSetRatio} (${ratio.toFixed(4)})`
			: `SetRatio < ${thresholds.minSetRatio} (${ratio.toFixed(4)})`,
	);

	return {
		decision: totals.rowCount > 0 && pnlOk && fillOk ? Decision.Go : Decision.NoGo,
		setRatio: ratio,
		reasons,
	};
}
