import { readFile } from 'node:fs/promises';
import * as ort from 'onnxruntime-web';
import { createLogger } from '../logging/logger';
import type { ModelOutput, ModelSession } from './session';

const log = createLogger('engine');

export type OnnxSessionOptions = {
	numThreads?: number;
};

class OnnxModelSession implements ModelSession {
	constructor(private readonly session: ort.InferenceSession) {}

	async run(input: Float32Array, dims: readonly number[]): Promise<ModelOutput> {
		const feeds: Record<string, ort.Tensor> = {};
		feeds[this.session.inputNames[0]] = new ort.Tensor('float32', input, dims);
		const results = await this.session.run(feeds);

		const out = results[this.session.outputNames[0]];
		if (!out || !(out.data instanceof Float32Array)) {
			throw new Error(`unexpected model output type ${out?.type ?? 'missing'}`);
		}
		return { data: out.data, dims: out.dims };
	}

	release(): Promise<void> {
		return this.session.release();
	}
}

/**
 * Loads an ONNX model with the onnxruntime-web WASM backend.
 * Returns null when the file is missing or the runtime refuses it, so the
 * server keeps signaling without detection.
 */
export async function loadOnnxSession(modelPath: string, options: OnnxSessionOptions = {}): Promise<ModelSession | null> {
	let bytes: Uint8Array;
	try {
		bytes = await readFile(modelPath);
	} catch (error) {
		log.warn('model file not readable, detection disabled', { modelPath, reason: String(error) });
		return null;
	}

	ort.env.wasm.numThreads = options.numThreads ?? 1;

	try {
		const session = await ort.InferenceSession.create(bytes, {
			executionProviders: ['wasm'],
			graphOptimizationLevel: 'all',
		});
		log.info('model loaded', {
			modelPath,
			inputNames: session.inputNames,
			outputNames: session.outputNames,
		});
		return new OnnxModelSession(session);
	} catch (error) {
		log.error('model session creation failed, detection disabled', error, { modelPath });
		return null;
	}
}
