import { describe, it, expect, vi } from 'vitest';
import type { Detection } from '@rtc-detect/shared';
import type { RawImage } from '../codec/letterbox';
import { DetectionEngine } from '../detection/engine';
import { PipelineClosedError } from '../errors';
import { deferred, tick } from '../testing/deferred';
import { FakeSession } from '../testing/fake-session';
import { CORRUPT_FRAME, checkerboard, pngDataUri } from '../testing/images';
import { FramePipeline, type FrameDetector } from './frame-pipeline';

const image: RawImage = { width: 2, height: 2, channels: 3, data: new Uint8Array(12) };
const person: Detection = { label: 'person', score: 0.9, xmin: 0.1, ymin: 0.2, xmax: 0.3, ymax: 0.4 };

function detector(detect: FrameDetector['detect'], available = true): FrameDetector {
	return { available, detect };
}

function clock(start = 1000) {
	let t = start;
	return () => t++;
}

describe('FramePipeline', () => {
	it('stamps receipt, inference and capture times', async () => {
		const pipeline = new FramePipeline(detector(async () => [person]), {
			decode: async () => image,
			now: clock(),
		});
		const result = await pipeline.process({ frameId: 'f7', captureTs: 500, payload: 'x' });
		expect(result).toEqual({
			frame_id: 'f7',
			capture_ts: 500,
			recv_ts: 1000,
			inference_ts: 1001,
			detections: [person],
		});
	});

	it('defaults capture time to receipt time and generates a frame id', async () => {
		const pipeline = new FramePipeline(detector(async () => []), { decode: async () => image, now: clock(42) });
		const result = await pipeline.process({ payload: 'x' });
		expect(result.capture_ts).toBe(42);
		expect(result.recv_ts).toBe(42);
		expect(result.frame_id).toMatch(/^[0-9a-f-]{36}$/);
	});

	it('short-circuits to empty detections when the engine is unavailable', async () => {
		const decode = vi.fn(async () => image);
		const pipeline = new FramePipeline(new DetectionEngine(null), { decode, now: clock(5) });
		const result = await pipeline.process({ frameId: 'f1', payload: 'x' });
		expect(result).toEqual({ frame_id: 'f1', capture_ts: 5, recv_ts: 5, inference_ts: 5, detections: [] });
		expect(decode).not.toHaveBeenCalled();
	});

	it('reports a corrupted image as an empty, flagged result', async () => {
		const detect = vi.fn(async () => [person]);
		const pipeline = new FramePipeline(detector(detect));
		const result = await pipeline.process({ frameId: 'f1', payload: CORRUPT_FRAME });
		expect(result.frame_id).toBe('f1');
		expect(result.detections).toEqual([]);
		expect(result.error).toBe('Failed to decode image');
		expect(detect).not.toHaveBeenCalled();
	});

	it('decodes a real image and hands it to the detector', async () => {
		const detect = vi.fn(async (img: RawImage) => [{ ...person, label: `${img.width}x${img.height}` }]);
		const pipeline = new FramePipeline(detector(detect));
		const result = await pipeline.process({ frameId: 'ok', payload: await pngDataUri(6, 4, checkerboard(6, 4)) });
		expect(result.error).toBeUndefined();
		expect(result.detections.map((d) => d.label)).toEqual(['6x4']);
	});

	it('reports an inference failure as an empty, flagged result', async () => {
		const engine = new DetectionEngine(FakeSession.failing('out of memory'), { inputSize: { width: 8, height: 8 } });
		const pipeline = new FramePipeline(engine, { decode: async () => image, now: clock(10) });
		const result = await pipeline.process({ frameId: 'f2', payload: 'x' });
		expect(result).toEqual({
			frame_id: 'f2',
			capture_ts: 10,
			recv_ts: 10,
			inference_ts: 11,
			detections: [],
			error: 'out of memory',
		});
	});

	it('keeps processing frames after a bad one', async () => {
		let calls = 0;
		const pipeline = new FramePipeline(
			detector(async () => {
				calls++;
				if (calls === 1) throw new Error('first frame breaks');
				return [person];
			}),
			{ decode: async () => image, workers: 1 }
		);
		const [bad, good] = await Promise.all([
			pipeline.process({ frameId: 'a', payload: 'x' }),
			pipeline.process({ frameId: 'b', payload: 'x' }),
		]);
		expect(bad.error).toBe('first frame breaks');
		expect(good.detections).toEqual([person]);
	});

	it('bounds concurrent inference by the worker count', async () => {
		const gate = deferred<Detection[]>();
		let running = 0;
		let peak = 0;
		const pipeline = new FramePipeline(
			detector(async () => {
				running++;
				peak = Math.max(peak, running);
				const out = await gate.promise;
				running--;
				return out;
			}),
			{ decode: async () => image, workers: 2 }
		);
		const frames = Array.from({ length: 5 }, (_, i) => pipeline.process({ frameId: `f${i}`, payload: 'x' }));
		await tick();
		expect(pipeline.stats).toEqual({ running: 2, pending: 3 });
		gate.resolve([]);
		await Promise.all(frames);
		expect(peak).toBe(2);
	});

	it('flags a frame that exceeds the timeout', async () => {
		const never = deferred<Detection[]>();
		const pipeline = new FramePipeline(detector(() => never.promise), { decode: async () => image, timeoutMs: 20 });
		const result = await pipeline.process({ frameId: 'slow', payload: 'x' });
		expect(result.detections).toEqual([]);
		expect(result.error).toBe('inference exceeded 20ms');
	});

	it('drains on close and rejects later submissions', async () => {
		const gate = deferred<Detection[]>();
		const pipeline = new FramePipeline(detector(() => gate.promise), { decode: async () => image });
		const inflight = pipeline.process({ frameId: 'f1', payload: 'x' });
		await tick();
		const closing = pipeline.close();
		await expect(pipeline.process({ frameId: 'f2', payload: 'x' })).rejects.toBeInstanceOf(PipelineClosedError);
		gate.resolve([person]);
		await closing;
		await expect(inflight).resolves.toMatchObject({ frame_id: 'f1', detections: [person] });
	});

	it('skips queued frames whose sender has gone away', async () => {
		const gate = deferred<Detection[]>();
		const detect = vi.fn(() => gate.promise);
		const pipeline = new FramePipeline(detector(detect), { decode: async () => image, workers: 1 });
		const controller = new AbortController();
		const first = pipeline.process({ frameId: 'a', payload: 'x' });
		const queued = pipeline.process({ frameId: 'b', payload: 'x', signal: controller.signal });
		controller.abort();
		gate.resolve([]);
		await first;
		await expect(queued).resolves.toMatchObject({ frame_id: 'b', detections: [], error: 'frame cancelled' });
		expect(detect).toHaveBeenCalledTimes(1);
	});
});
