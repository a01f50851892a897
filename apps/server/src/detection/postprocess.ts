import type { Detection } from '@rtc-detect/shared';
import { unletterbox, type LetterboxGeometry } from '../codec/letterbox';
import { labelFor } from './labels';
import type { ModelOutput } from './session';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.25;

export type DecodeOptions = {
	threshold?: number;
	labels?: readonly string[];
};

/**
 * Turns raw rows `[x_center, y_center, width, height, objectness, class_scores...]`
 * (model-input pixels) into detections normalized to the original frame.
 *
 * A row survives only if both its objectness and its best class score reach
 * the threshold. Overlapping boxes are all kept: no non-max suppression.
 */
export function decodeDetections(output: ModelOutput, geometry: LetterboxGeometry, options: DecodeOptions = {}): Detection[] {
	const threshold = options.threshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
	const { data, dims } = output;
	const rowWidth = dims[dims.length - 1] ?? 0;
	const detections: Detection[] = [];
	if (rowWidth < 6 || data.length === 0) return detections;

	const numRows = Math.floor(data.length / rowWidth);
	for (let r = 0; r < numRows; r++) {
		const base = r * rowWidth;
		const cx = data[base];
		const cy = data[base + 1];
		const w = data[base + 2];
		const h = data[base + 3];
		const objectness = data[base + 4];
		if (![cx, cy, w, h, objectness].every(Number.isFinite)) continue;
		if (objectness < threshold) continue;

		let bestClass = -1;
		let bestScore = -Infinity;
		for (let c = 0; c < rowWidth - 5; c++) {
			const s = data[base + 5 + c];
			if (s > bestScore) {
				bestScore = s;
				bestClass = c;
			}
		}
		if (!Number.isFinite(bestScore) || bestScore < threshold) continue;

		const box = unletterbox({ xmin: cx - w / 2, ymin: cy - h / 2, xmax: cx + w / 2, ymax: cy + h / 2 }, geometry);
		detections.push({
			label: labelFor(bestClass, options.labels),
			score: Math.min(1, Math.max(0, objectness * bestScore)),
			...box,
		});
	}
	return detections;
}
