import type { LatencySummary } from '@rtc-detect/shared';

/** Median and 95th percentile of the finite values, 0 for an empty set. */
export function summarizeLatencies(values: readonly number[]): LatencySummary {
	const sorted = values.filter((n) => Number.isFinite(n)).sort((x, y) => x - y);
	if (sorted.length === 0) return { median: 0, p95: 0 };
	const median = sorted[Math.floor(sorted.length / 2)];
	const p95 = sorted[Math.min(Math.floor(sorted.length * 0.95), sorted.length - 1)];
	return { median, p95 };
}
