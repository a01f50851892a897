import { PipelineClosedError } from '../errors';

// a queued job settles its submitter's promise itself and never rejects
type Job = () => Promise<void>;

/**
 * Fixed-capacity task queue. At most `capacity` tasks run at once; the rest
 * wait in FIFO order. Submitters get a promise they can await without
 * holding up anything else on the event loop.
 */
export class WorkerPool {
	private readonly queue: Job[] = [];
	private active = 0;
	private closed = false;
	private drainWaiters: Array<() => void> = [];

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`worker pool capacity must be a positive integer, got ${capacity}`);
		}
	}

	get running(): number {
		return this.active;
	}

	get pending(): number {
		return this.queue.length;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	submit<T>(run: () => Promise<T>): Promise<T> {
		if (this.closed) return Promise.reject(new PipelineClosedError());
		return new Promise<T>((resolve, reject) => {
			this.queue.push(async () => {
				try {
					resolve(await run());
				} catch (error) {
					reject(error);
				}
			});
			this.pump();
		});
	}

	/** Stops accepting work and resolves once queued and running tasks finish. */
	close(): Promise<void> {
		this.closed = true;
		if (this.idle()) return Promise.resolve();
		return new Promise((resolve) => this.drainWaiters.push(resolve));
	}

	private idle(): boolean {
		return this.active === 0 && this.queue.length === 0;
	}

	private pump(): void {
		while (this.active < this.capacity) {
			const job = this.queue.shift();
			if (!job) break;
			this.active++;
			void job().then(() => {
				this.active--;
				this.pump();
			});
		}
		if (this.closed && this.idle()) {
			const waiters = this.drainWaiters;
			this.drainWaiters = [];
			for (const resolve of waiters) resolve();
		}
	}
}
