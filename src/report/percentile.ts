/**
 * Nearest-rank percentile with floor indexing over an ascending array.
 * No interpolation between ranks: the result is always an element of the input.
 * Empty input yields 0.
 */
export function percentile(sortedAsc: readonly number[], p: number): number {
	const n = sortedAsc.length;
	if (n === 0) return 0;

	const first = sortedAsc[0] ?? 0;
	if (p <= 0) return first;
	if (p >= 1) return sortedAsc[n - 1] ?? first;

	const idx = Math.floor(p * (n - 1));
	return sortedAsc[idx] ?? first;
}
