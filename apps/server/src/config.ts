/**
 * Environment configuration.
 * Validated once at startup.
 */
import { ConfigError } from './errors';
import { isLogLevel, type LogLevel } from './logging/logger';

export type ServerConfig = {
	host: string;
	port: number;
	modelPath: string;
	modelInputSize: number;
	confidenceThreshold: number;
	inferenceWorkers: number;
	frameTimeoutMs: number; // 0 disables the per-frame timeout
	ortNumThreads: number;
	logLevel: LogLevel;
};

export const DEFAULT_CONFIG: ServerConfig = {
	host: '0.0.0.0',
	port: 8000,
	modelPath: 'models/yolov5n.onnx',
	modelInputSize: 640,
	confidenceThreshold: 0.25,
	inferenceWorkers: 2,
	frameTimeoutMs: 0,
	ortNumThreads: 1,
	logLevel: 'info',
};

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === '') return fallback;
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`, name);
	}
	return value;
}

function readUnitInterval(env: Env, name: string, fallback: number): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === '') return fallback;
	const value = Number(raw);
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		throw new ConfigError(`Invalid ${name}: expected a number in [0, 1], got "${raw}"`, name);
	}
	return value;
}

export function loadConfig(env: Env = process.env): ServerConfig {
	const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || DEFAULT_CONFIG.logLevel;
	if (!isLogLevel(logLevel)) {
		throw new ConfigError(`Invalid LOG_LEVEL: expected error, warn, info or debug, got "${logLevel}"`, 'LOG_LEVEL');
	}

	const port = readInteger(env, 'PORT', DEFAULT_CONFIG.port, 0);
	if (port > 65535) {
		throw new ConfigError(`Invalid PORT: ${port} is out of range`, 'PORT');
	}

	return {
		host: env.HOST?.trim() || DEFAULT_CONFIG.host,
		port,
		modelPath: env.MODEL_PATH?.trim() || DEFAULT_CONFIG.modelPath,
		modelInputSize: readInteger(env, 'MODEL_INPUT_SIZE', DEFAULT_CONFIG.modelInputSize, 32),
		confidenceThreshold: readUnitInterval(env, 'CONFIDENCE_THRESHOLD', DEFAULT_CONFIG.confidenceThreshold),
		inferenceWorkers: readInteger(env, 'INFERENCE_WORKERS', DEFAULT_CONFIG.inferenceWorkers, 1),
		frameTimeoutMs: readInteger(env, 'FRAME_TIMEOUT_MS', DEFAULT_CONFIG.frameTimeoutMs, 0),
		ortNumThreads: readInteger(env, 'ORT_NUM_THREADS', DEFAULT_CONFIG.ortNumThreads, 1),
		logLevel,
	};
}
