/**
 * Line-oriented key=value rendering of a shadow report.
 *
 * Numbers are always positional fixed-point. Output must stay byte-identical
 * to archived reports: exact binary ties round half-to-even and negative zero
 * keeps its sign.
 */
import { groupSetRatio } from "./group-stats.js";
import type { GroupStats, Summary, Verdict } from "./types.js";

const PNL_DIGITS = 6;
const RATIO_DIGITS = 4;

/** Emitted verbatim when the log has a header and no data rows. */
export const EMPTY_REPORT_LINES: readonly string[] = Object.freeze([
	"rows=0",
	"TotalShadowPnL_sum=0",
	"SetRatio=0",
	"GO_NO_GO=NO_GO",
]);

export function formatReport(
	summary: Summary,
	verdict: Verdict,
	worstTailPnl: number,
): readonly string[] {
	if (summary.rowCount === 0) {
		return EMPTY_REPORT_LINES;
	}

	const lines: string[] = [
		`rows=${summary.rowCount}`,
		`TotalShadowPnL_sum=${formatFixed(summary.totalPnl, PNL_DIGITS)}`,
		`SetRatio=${formatFixed(verdict.setRatio, RATIO_DIGITS)}`,
		`worst1pct_pnl_total=${formatFixed(worstTailPnl, PNL_DIGITS)}`,
	];

	pushGroupLines(lines, "bucket", summary.byBucket);
	pushGroupLines(lines, "strategy", summary.byStrategy);

	lines.push(`GO_NO_GO=${verdict.decision}`);
	return lines;
}

function pushGroupLines(
	lines: string[],
	prefix: string,
	groups: ReadonlyMap<string, Readonly<GroupStats>>,
): void {
	for (const key of sortedKeys(groups)) {
		const stats = groups.get(key);
		if (stats === undefined) continue;
		lines.push(`${prefix}[${key}].n=${stats.count}`);
		lines.push(`${prefix}[${key}].TotalShadowPnL_sum=${formatFixed(stats.pnlSum, PNL_DIGITS)}`);
		lines.push(`${prefix}[${key}].SetRatio=${formatFixed(groupSetRatio(stats), RATIO_DIGITS)}`);
	}
}

/** Keys in code-point order, independent of insertion order. */
export function sortedKeys(groups: ReadonlyMap<string, unknown>): string[] {
	return [...groups.keys()].sort(compareCodePoints);
}

function compareCodePoints(a: string, b: string): number {
	const ia = a[Symbol.iterator]();
	const ib = b[Symbol.iterator]();
	for (;;) {
		const ca = ia.next();
		const cb = ib.next();
		if (ca.done === true) return cb.done === true ? 0 : -1;
		if (cb.done === true) return 1;
		const diff = (ca.value.codePointAt(0) ?? 0) - (cb.value.codePointAt(0) ?? 0);
		if (diff !== 0) return diff;
	}
}

/**
 * Fixed-point with exactly `digits` decimals.
 * Unlike Number#toFixed: never exponential (values >= 1e21), ties on the exact
 * binary value go to the even digit, and -0 prints as "-0.000000".
 */
export function formatFixed(value: number, digits: number): string {
	if (Number.isNaN(value)) return "nan";
	if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";

	const sign = value < 0 || Object.is(value, -0) ? "-" : "";
	const abs = Math.abs(value);

	if (abs >= 1e21) {
		// every double this large is an integer
		const fraction = digits > 0 ? `.${"0".repeat(digits)}` : "";
		return `${sign}${BigInt(abs).toString()}${fraction}`;
	}

	return `${sign}${roundHalfEven(abs, digits)}`;
}

function roundHalfEven(abs: number, digits: number): string {
	const halfUp = abs.toFixed(digits);
	// A tie needs the exact value to end at digit `digits + 1`, which only
	// dyadic values with at most that many fractional bits can do.
	if (!Number.isInteger(abs * 2 ** (digits + 1))) {
		return halfUp;
	}
	const exact = abs.toFixed(digits + 1);
	if (!exact.endsWith("5")) {
		return halfUp;
	}
	let truncated = exact.slice(0, -1);
	if (truncated.endsWith(".")) {
		truncated = truncated.slice(0, -1);
	}
	const lastDigit = Number(truncated.charAt(truncated.length - 1));
	return lastDigit % 2 === 0 ? truncated : halfUp;
}
