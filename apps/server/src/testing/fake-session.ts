import type { ModelOutput, ModelSession } from '../detection/session';

/**
 * In-process stand-in for a model session. Returns fixed rows, or runs a
 * custom handler, and records every call.
 */
export class FakeSession implements ModelSession {
	calls: Array<{ input: Float32Array; dims: readonly number[] }> = [];
	released = false;

	constructor(private readonly handler: (input: Float32Array, dims: readonly number[]) => ModelOutput | Promise<ModelOutput>) {}

	static returningRows(rows: number[][]): FakeSession {
		const width = rows[0]?.length ?? 0;
		return new FakeSession(() => ({ data: Float32Array.from(rows.flat()), dims: [1, rows.length, width] }));
	}

	static failing(message: string): FakeSession {
		return new FakeSession(() => {
			throw new Error(message);
		});
	}

	async run(input: Float32Array, dims: readonly number[]): Promise<ModelOutput> {
		this.calls.push({ input, dims });
		return this.handler(input, dims);
	}

	async release(): Promise<void> {
		this.released = true;
	}
}
