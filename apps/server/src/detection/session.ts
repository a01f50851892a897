/**
 * The slice of an inference runtime the engine needs. Kept separate from
 * onnxruntime-web so the engine can run against an in-process fake.
 */
export type ModelOutput = {
	data: Float32Array;
	dims: readonly number[];
};

export interface ModelSession {
	/** Runs the model on one NCHW float32 input. */
	run(input: Float32Array, dims: readonly number[]): Promise<ModelOutput>;
	release(): Promise<void>;
}
