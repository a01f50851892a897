import { describe, it, expect } from 'vitest';
import { PipelineClosedError } from '../errors';
import { deferred, tick } from '../testing/deferred';
import { WorkerPool } from './worker-pool';

describe('WorkerPool', () => {
	it('rejects a non-positive capacity', () => {
		expect(() => new WorkerPool(0)).toThrow(RangeError);
	});

	it('never runs more than capacity tasks at once', async () => {
		const pool = new WorkerPool(2);
		const gates = [deferred<number>(), deferred<number>(), deferred<number>(), deferred<number>()];
		let concurrent = 0;
		let peak = 0;
		const results = gates.map((gate, i) =>
			pool.submit(async () => {
				concurrent++;
				peak = Math.max(peak, concurrent);
				const v = await gate.promise;
				concurrent--;
				return v * 10 + i;
			})
		);

		await tick();
		expect(pool.running).toBe(2);
		expect(pool.pending).toBe(2);

		gates.forEach((gate, i) => gate.resolve(i));
		await expect(Promise.all(results)).resolves.toEqual([0, 11, 22, 33]);
		expect(peak).toBe(2);
	});

	it('starts queued tasks in submission order', async () => {
		const pool = new WorkerPool(1);
		const order: string[] = [];
		await Promise.all(
			['a', 'b', 'c'].map((name) =>
				pool.submit(async () => {
					order.push(name);
				})
			)
		);
		expect(order).toEqual(['a', 'b', 'c']);
	});

	it('keeps running after a task fails', async () => {
		const pool = new WorkerPool(1);
		const failed = pool.submit(async () => {
			throw new Error('boom');
		});
		const thrownSync = pool.submit<number>(() => {
			throw new Error('sync boom');
		});
		const ok = pool.submit(async () => 'fine');
		await expect(failed).rejects.toThrow('boom');
		await expect(thrownSync).rejects.toThrow('sync boom');
		await expect(ok).resolves.toBe('fine');
	});

	it('drains outstanding work on close and refuses new work', async () => {
		const pool = new WorkerPool(1);
		const gate = deferred<string>();
		const first = pool.submit(() => gate.promise);
		const second = pool.submit(async () => 'second');

		let drained = false;
		const closing = pool.close().then(() => {
			drained = true;
		});
		await expect(pool.submit(async () => 'late')).rejects.toBeInstanceOf(PipelineClosedError);

		await tick();
		expect(drained).toBe(false);

		gate.resolve('first');
		await closing;
		expect(drained).toBe(true);
		await expect(first).resolves.toBe('first');
		await expect(second).resolves.toBe('second');
	});

	it('closes immediately when idle', async () => {
		await expect(new WorkerPool(2).close()).resolves.toBeUndefined();
	});
});
