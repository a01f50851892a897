import type { Detection } from '@rtc-detect/shared';
import { letterbox, toTensorData, type RawImage } from '../codec/letterbox';
import { createLogger } from '../logging/logger';
import { COCO_LABELS } from './labels';
import { DEFAULT_CONFIDENCE_THRESHOLD, decodeDetections } from './postprocess';
import type { ModelSession } from './session';

const log = createLogger('engine');

export type DetectionEngineOptions = {
	inputSize?: { width: number; height: number };
	threshold?: number;
	labels?: readonly string[];
};

/**
 * Wraps a loaded model. With no session the engine is "unavailable" and
 * every call yields an empty list; that is a steady state, not a failure.
 * The session is read-only after load and may be run concurrently.
 */
export class DetectionEngine {
	readonly inputSize: { width: number; height: number };
	readonly threshold: number;
	private readonly labels: readonly string[];

	constructor(
		private session: ModelSession | null,
		options: DetectionEngineOptions = {}
	) {
		this.inputSize = options.inputSize ?? { width: 640, height: 640 };
		this.threshold = options.threshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
		this.labels = options.labels ?? COCO_LABELS;
	}

	get available(): boolean {
		return this.session !== null;
	}

	async detect(image: RawImage): Promise<Detection[]> {
		const session = this.session;
		if (!session) return [];

		const { width, height } = this.inputSize;
		const boxed = letterbox(image, height, width);
		const output = await session.run(toTensorData(boxed.image), [1, 3, height, width]);
		return decodeDetections(output, boxed, { threshold: this.threshold, labels: this.labels });
	}

	async release(): Promise<void> {
		const session = this.session;
		if (!session) return;
		this.session = null;
		await session.release();
		log.info('model session released');
	}
}
