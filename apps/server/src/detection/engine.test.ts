import { describe, it, expect } from 'vitest';
import type { RawImage } from '../codec/letterbox';
import { FakeSession } from '../testing/fake-session';
import { DetectionEngine } from './engine';

const frame: RawImage = { width: 4, height: 2, channels: 3, data: new Uint8Array(4 * 2 * 3).fill(255) };

describe('DetectionEngine', () => {
	it('returns an empty list when no model is loaded', async () => {
		const engine = new DetectionEngine(null);
		expect(engine.available).toBe(false);
		await expect(engine.detect(frame)).resolves.toEqual([]);
	});

	it('feeds a letterboxed NCHW tensor of the configured size', async () => {
		const session = FakeSession.returningRows([[0, 0, 0, 0, 0, 0]]);
		const engine = new DetectionEngine(session, { inputSize: { width: 8, height: 8 } });
		await engine.detect(frame);

		expect(session.calls).toHaveLength(1);
		const { input, dims } = session.calls[0];
		expect(dims).toEqual([1, 3, 8, 8]);
		expect(input).toHaveLength(3 * 64);
		// row 0 is padding, row 2 is image
		expect(input[0]).toBeCloseTo(114 / 255, 6);
		expect(input[2 * 8]).toBe(1);
	});

	it('decodes rows into normalized detections', async () => {
		// 4x2 frame in 8x8: scale 2, pad top 2
		const session = FakeSession.returningRows([[4, 4, 4, 2, 0.9, 0.05, 0.05, 0.8]]);
		const engine = new DetectionEngine(session, { inputSize: { width: 8, height: 8 } });
		const [det] = await engine.detect(frame);
		expect(det.label).toBe('car');
		expect(det.score).toBeCloseTo(0.72, 5);
		expect(det.xmin).toBeCloseTo(0.25, 6);
		expect(det.xmax).toBeCloseTo(0.75, 6);
		expect(det.ymin).toBeCloseTo(0.25, 6);
		expect(det.ymax).toBeCloseTo(0.75, 6);
	});

	it('applies its threshold to both gates', async () => {
		const session = FakeSession.returningRows([[4, 4, 4, 2, 0.5, 0.5]]);
		const strict = new DetectionEngine(session, { inputSize: { width: 8, height: 8 }, threshold: 0.6 });
		await expect(strict.detect(frame)).resolves.toEqual([]);
	});

	it('propagates inference failures to the caller', async () => {
		const engine = new DetectionEngine(FakeSession.failing('kernel exploded'), { inputSize: { width: 8, height: 8 } });
		await expect(engine.detect(frame)).rejects.toThrow('kernel exploded');
	});

	it('releases the session once and becomes unavailable', async () => {
		const session = FakeSession.returningRows([]);
		const engine = new DetectionEngine(session);
		await engine.release();
		await engine.release();
		expect(session.released).toBe(true);
		expect(engine.available).toBe(false);
	});
});
