/**
 * Messages exchanged between the main thread and inference workers.
 * Everything crossing the thread boundary arrives as `unknown` and is
 * checked with the guards below.
 */
import type { Detection } from '@rtc-detect/shared';
import { isLogLevel, type LogLevel } from '../logging/logger';
import type { ModelSession } from './session';

export type InferenceWorkerConfig = {
	modelPath: string;
	numThreads: number;
	inputSize: number;
	threshold: number;
	logLevel: LogLevel;
	// URL of a module exporting `loadSession(config)`; the ONNX loader when absent
	sessionModule?: string;
};

export type SessionModule = {
	loadSession(config: InferenceWorkerConfig): Promise<ModelSession | null> | ModelSession | null;
};

export type DetectRequest = {
	type: 'detect';
	id: number;
	width: number;
	height: number;
	data: ArrayBuffer; // RGB, transferred
};

export type WorkerRequest = DetectRequest | { type: 'close' };

export type WorkerReply =
	| { type: 'ready'; available: boolean }
	| { type: 'result'; id: number; detections: Detection[] }
	| { type: 'failed'; id: number; message: string };

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
	return typeof value === 'object' && value !== null;
}

function isCount(value: unknown): value is number {
	return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function isWorkerConfig(value: unknown): value is InferenceWorkerConfig {
	if (!isRecord(value)) return false;
	return (
		typeof value.modelPath === 'string' &&
		isCount(value.numThreads) &&
		isCount(value.inputSize) &&
		typeof value.threshold === 'number' &&
		typeof value.logLevel === 'string' &&
		isLogLevel(value.logLevel) &&
		(value.sessionModule === undefined || typeof value.sessionModule === 'string')
	);
}

export function isSessionModule(value: unknown): value is SessionModule {
	return isRecord(value) && typeof value.loadSession === 'function';
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
	if (!isRecord(value)) return false;
	if (value.type === 'close') return true;
	return (
		value.type === 'detect' &&
		typeof value.id === 'number' &&
		isCount(value.width) &&
		isCount(value.height) &&
		value.data instanceof ArrayBuffer
	);
}

export function isWorkerReply(value: unknown): value is WorkerReply {
	if (!isRecord(value)) return false;
	switch (value.type) {
		case 'ready':
			return typeof value.available === 'boolean';
		case 'result':
			return typeof value.id === 'number' && Array.isArray(value.detections);
		case 'failed':
			return typeof value.id === 'number' && typeof value.message === 'string';
		default:
			return false;
	}
}
