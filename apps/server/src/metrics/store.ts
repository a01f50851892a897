import { randomUUID } from 'node:crypto';
import type { SessionMetrics, StoredSessionMetrics } from '@rtc-detect/shared';

/** Write-and-query sink for session summaries. Storage is up to the implementation. */
export interface MetricsStore {
	save(metrics: SessionMetrics): Promise<StoredSessionMetrics>;
	listBySession(sessionId: string, limit?: number): Promise<StoredSessionMetrics[]>;
}

export const DEFAULT_LIST_LIMIT = 100;

export class InMemoryMetricsStore implements MetricsStore {
	private readonly records: StoredSessionMetrics[] = [];

	constructor(private readonly now: () => Date = () => new Date()) {}

	async save(metrics: SessionMetrics): Promise<StoredSessionMetrics> {
		const stored: StoredSessionMetrics = {
			...metrics,
			id: randomUUID(),
			timestamp: this.now().toISOString(),
		};
		this.records.push(stored);
		return stored;
	}

	async listBySession(sessionId: string, limit = DEFAULT_LIST_LIMIT): Promise<StoredSessionMetrics[]> {
		return this.records.filter((r) => r.session_id === sessionId).slice(0, limit);
	}
}
