import { Worker } from 'node:worker_threads';
import type { Detection } from '@rtc-detect/shared';
import type { RawImage } from '../codec/letterbox';
import { PipelineClosedError } from '../errors';
import { createLogger } from '../logging/logger';
import type { FrameDetector } from '../pipeline/frame-pipeline';
import { isWorkerReply, type DetectRequest, type InferenceWorkerConfig, type WorkerReply } from './worker-protocol';

const log = createLogger('engine');

const WORKER_ENTRY = new URL('./inference-worker.ts', import.meta.url);
const STOP_GRACE_MS = 2000;

type Job = {
	id: number;
	image: RawImage;
	resolve: (detections: Detection[]) => void;
	reject: (error: Error) => void;
};

type Slot = {
	worker: Worker;
	job?: Job;
};

// workers load TypeScript sources, so they need the tsx loader the main thread may already carry
function workerExecArgv(): string[] {
	const inherited = process.execArgv;
	return inherited.some((arg) => arg.includes('tsx')) ? inherited : [...inherited, '--import', 'tsx'];
}

function waitForReady(worker: Worker): Promise<boolean> {
	return new Promise((resolve, reject) => {
		const onMessage = (message: unknown) => {
			if (!isWorkerReply(message) || message.type !== 'ready') return;
			cleanup();
			resolve(message.available);
		};
		const onError = (error: Error) => {
			cleanup();
			reject(error);
		};
		const onExit = (code: number) => {
			cleanup();
			reject(new Error(`inference worker exited with code ${code} before loading`));
		};
		const cleanup = () => {
			worker.off('message', onMessage);
			worker.off('error', onError);
			worker.off('exit', onExit);
		};
		worker.on('message', onMessage);
		worker.on('error', onError);
		worker.on('exit', onExit);
	});
}

/**
 * Runs detection on dedicated worker threads, each holding its own model
 * session, so a frame in flight never occupies the thread serving sockets.
 * A pool whose workers could not load the model holds no threads and
 * answers every frame with an empty list.
 */
export class InferenceThreadPool implements FrameDetector {
	private readonly queue: Job[] = [];
	private nextId = 1;
	private closed = false;

	private constructor(private slots: Slot[]) {
		for (const slot of slots) this.watch(slot);
	}

	static async start(config: InferenceWorkerConfig, size: number): Promise<InferenceThreadPool> {
		if (!Number.isInteger(size) || size < 1) {
			throw new RangeError(`inference pool size must be a positive integer, got ${size}`);
		}
		const execArgv = workerExecArgv();
		const workers = Array.from({ length: size }, () => new Worker(WORKER_ENTRY, { workerData: config, execArgv }));
		const loaded = await Promise.allSettled(workers.map(waitForReady));

		if (loaded.every((outcome) => outcome.status === 'fulfilled' && outcome.value)) {
			log.info('inference workers ready', { workers: size });
			return new InferenceThreadPool(workers.map((worker) => ({ worker })));
		}

		for (const outcome of loaded) {
			if (outcome.status === 'rejected') log.error('inference worker failed to start', outcome.reason);
		}
		await Promise.all(workers.map((worker) => worker.terminate()));
		return new InferenceThreadPool([]);
	}

	get available(): boolean {
		return this.slots.length > 0;
	}

	detect(image: RawImage): Promise<Detection[]> {
		if (!this.available) return Promise.resolve([]);
		return new Promise((resolve, reject) => {
			this.queue.push({ id: this.nextId++, image, resolve, reject });
			this.pump();
		});
	}

	/** Stops every worker after letting it release its session. */
	async release(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		const slots = this.slots;
		this.slots = [];
		this.failQueued(new PipelineClosedError());
		await Promise.all(slots.map((slot) => this.stop(slot)));
		log.info('inference workers stopped', { workers: slots.length });
	}

	private pump(): void {
		for (const slot of this.slots) {
			if (slot.job) continue;
			const job = this.queue.shift();
			if (!job) return;
			this.send(slot, job);
		}
	}

	private send(slot: Slot, job: Job): void {
		slot.job = job;
		const { width, height, data } = job.image;
		const pixels = new ArrayBuffer(data.byteLength);
		new Uint8Array(pixels).set(data);
		const request: DetectRequest = { type: 'detect', id: job.id, width, height, data: pixels };
		slot.worker.postMessage(request, [pixels]);
	}

	private watch(slot: Slot): void {
		slot.worker.on('message', (message: unknown) => {
			if (!isWorkerReply(message)) {
				log.warn('unrecognized reply from inference worker');
				return;
			}
			this.settle(slot, message);
		});
		slot.worker.on('error', (error) => this.lose(slot, error));
		slot.worker.on('exit', (code) => this.lose(slot, new Error(`inference worker exited with code ${code}`)));
	}

	private settle(slot: Slot, reply: WorkerReply): void {
		const job = slot.job;
		if (reply.type === 'ready' || !job || job.id !== reply.id) return;
		slot.job = undefined;
		if (reply.type === 'result') job.resolve(reply.detections);
		else job.reject(new Error(reply.message));
		this.pump();
	}

	private lose(slot: Slot, error: Error): void {
		if (this.closed || !this.slots.includes(slot)) return;
		this.slots = this.slots.filter((s) => s !== slot);
		log.error('inference worker lost', error, { remaining: this.slots.length });
		slot.job?.reject(error);
		slot.job = undefined;
		if (this.slots.length === 0) this.failQueued(error);
		else this.pump();
	}

	private failQueued(error: Error): void {
		for (const job of this.queue.splice(0)) job.reject(error);
	}

	private async stop(slot: Slot): Promise<void> {
		const exited = new Promise<void>((resolve) => slot.worker.once('exit', () => resolve()));
		slot.worker.postMessage({ type: 'close' });
		let timer: NodeJS.Timeout | undefined;
		const timedOut = new Promise<'timeout'>((resolve) => {
			timer = setTimeout(() => resolve('timeout'), STOP_GRACE_MS);
		});
		const outcome = await Promise.race([exited.then(() => 'exited' as const), timedOut]);
		clearTimeout(timer);
		if (outcome === 'timeout') {
			log.warn('inference worker did not exit, terminating', { graceMs: STOP_GRACE_MS });
			await slot.worker.terminate();
		}
	}
}
