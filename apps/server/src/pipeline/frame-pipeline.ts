import { randomUUID } from 'node:crypto';
import type { Detection, InferenceResult } from '@rtc-detect/shared';
import { decodeFrame } from '../codec/frame-codec';
import type { RawImage } from '../codec/letterbox';
import { errorMessage, FrameTimeoutError, PipelineClosedError } from '../errors';
import { createLogger } from '../logging/logger';
import { WorkerPool } from './worker-pool';

const log = createLogger('pipeline');

export type FrameRequest = {
	frameId?: string;
	captureTs?: number;
	payload: string;
	// aborted when the sender goes away; queued frames are then skipped
	signal?: AbortSignal;
};

type FrameOutcome = {
	inferenceTs: number;
	detections: Detection[];
	error?: string;
};

/** What the pipeline needs from the engine. */
export interface FrameDetector {
	readonly available: boolean;
	detect(image: RawImage): Promise<Detection[]>;
}

export type FramePipelineOptions = {
	workers?: number;
	timeoutMs?: number; // 0 or absent: no timeout
	decode?: (payload: string) => Promise<RawImage>;
	now?: () => number;
};

/**
 * Bridges frame submissions to the detector through a bounded pool.
 * Always resolves with a normally shaped result: decode and inference
 * failures come back as empty detections with `error` set.
 */
export class FramePipeline {
	private readonly pool: WorkerPool;
	private readonly timeoutMs: number;
	private readonly decode: (payload: string) => Promise<RawImage>;
	private readonly now: () => number;

	constructor(
		private readonly detector: FrameDetector,
		options: FramePipelineOptions = {}
	) {
		this.pool = new WorkerPool(options.workers ?? 2);
		this.timeoutMs = options.timeoutMs ?? 0;
		this.decode = options.decode ?? decodeFrame;
		this.now = options.now ?? Date.now;
	}

	get stats(): { running: number; pending: number } {
		return { running: this.pool.running, pending: this.pool.pending };
	}

	/**
	 * Rejects with PipelineClosedError after `close()`; every other failure
	 * is folded into the result.
	 */
	async process(request: FrameRequest): Promise<InferenceResult> {
		if (this.pool.isClosed) throw new PipelineClosedError();

		const recvTs = this.now();
		const base = {
			frame_id: request.frameId ?? randomUUID(),
			capture_ts: request.captureTs ?? recvTs,
			recv_ts: recvTs,
		};

		if (!this.detector.available) {
			return { ...base, inference_ts: recvTs, detections: [] };
		}

		let outcome: FrameOutcome;
		try {
			outcome = await this.withTimeout(this.pool.submit(() => this.run(base.frame_id, request)));
		} catch (error) {
			if (error instanceof PipelineClosedError) throw error;
			log.warn('frame abandoned', { frameId: base.frame_id, reason: errorMessage(error) });
			outcome = { inferenceTs: this.now(), detections: [], error: errorMessage(error) };
		}

		const result: InferenceResult = { ...base, inference_ts: outcome.inferenceTs, detections: outcome.detections };
		if (outcome.error !== undefined) result.error = outcome.error;
		return result;
	}

	/** Lets queued and running frames finish; later submissions fail fast. */
	close(): Promise<void> {
		return this.pool.close();
	}

	private async run(frameId: string, { payload, signal }: FrameRequest): Promise<FrameOutcome> {
		if (signal?.aborted) {
			return { inferenceTs: this.now(), detections: [], error: 'frame cancelled' };
		}

		let image: RawImage;
		try {
			image = await this.decode(payload);
		} catch (error) {
			log.debug('frame decode failed', { frameId, reason: errorMessage(error) });
			return { inferenceTs: this.now(), detections: [], error: errorMessage(error) };
		}

		const inferenceTs = this.now();
		try {
			return { inferenceTs, detections: await this.detector.detect(image) };
		} catch (error) {
			log.error('inference failed', error, { frameId });
			return { inferenceTs, detections: [], error: errorMessage(error) };
		}
	}

	private withTimeout<T>(task: Promise<T>): Promise<T> {
		if (this.timeoutMs <= 0) return task;
		return new Promise<T>((resolve, reject) => {
			const timer = setTimeout(() => reject(new FrameTimeoutError(this.timeoutMs)), this.timeoutMs);
			void task.then(
				(value) => {
					clearTimeout(timer);
					resolve(value);
				},
				(error: unknown) => {
					clearTimeout(timer);
					reject(error);
				}
			);
		});
	}
}
