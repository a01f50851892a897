import type { SessionMetrics } from '@rtc-detect/shared';
import { summarizeLatencies } from './summary';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonNegative(value: unknown): number | undefined {
	return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

/**
 * Checks a posted session summary. Clients that only collected raw
 * samples may send `e2e_latencies` instead of the two percentile fields.
 */
export function parseSessionMetrics(body: unknown): ValidationResult<SessionMetrics> {
	if (!isRecord(body)) return { ok: false, errors: ['body must be a JSON object'] };

	const errors: string[] = [];
	const check = (field: string, value: number | undefined, rule = 'a non-negative number'): number => {
		if (value === undefined) errors.push(`${field} must be ${rule}`);
		return value ?? 0;
	};

	const sessionId = typeof body.session_id === 'string' && body.session_id.length > 0 ? body.session_id : undefined;
	if (sessionId === undefined) errors.push('session_id must be a non-empty string');

	const frameCount = nonNegative(body.frame_count);
	const summary =
		body.median_e2e_latency === undefined && body.p95_e2e_latency === undefined && Array.isArray(body.e2e_latencies)
			? summarizeLatencies(body.e2e_latencies.filter((s): s is number => typeof s === 'number'))
			: { median: body.median_e2e_latency, p95: body.p95_e2e_latency };

	const value: SessionMetrics = {
		session_id: sessionId ?? '',
		frame_count: check('frame_count', Number.isInteger(frameCount) ? frameCount : undefined, 'a non-negative integer'),
		processed_fps: check('processed_fps', nonNegative(body.processed_fps)),
		median_e2e_latency: check('median_e2e_latency', nonNegative(summary.median)),
		p95_e2e_latency: check('p95_e2e_latency', nonNegative(summary.p95)),
		uplink_kbps: check('uplink_kbps', nonNegative(body.uplink_kbps)),
		downlink_kbps: check('downlink_kbps', nonNegative(body.downlink_kbps)),
	};

	return errors.length > 0 ? { ok: false, errors } : { ok: true, value };
}
