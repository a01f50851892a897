/**
 * Entry point of an inference worker thread. Owns one model session and
 * runs letterboxing, tensor packing, the model and row decoding off the
 * main thread, one frame at a time.
 */
import { parentPort, workerData, type MessagePort } from 'node:worker_threads';
import { errorMessage } from '../errors';
import { createLogger, setLogLevel } from '../logging/logger';
import { DetectionEngine } from './engine';
import type { ModelSession } from './session';
import { isSessionModule, isWorkerConfig, isWorkerRequest, type InferenceWorkerConfig, type WorkerReply } from './worker-protocol';

const log = createLogger('inference-worker');

async function loadSession(config: InferenceWorkerConfig): Promise<ModelSession | null> {
	if (config.sessionModule === undefined) {
		const { loadOnnxSession } = await import('./onnx-session');
		return loadOnnxSession(config.modelPath, { numThreads: config.numThreads });
	}
	const loaded: unknown = await import(config.sessionModule);
	if (!isSessionModule(loaded)) {
		throw new Error(`${config.sessionModule} does not export loadSession`);
	}
	return loaded.loadSession(config);
}

async function serve(port: MessagePort, config: InferenceWorkerConfig): Promise<void> {
	setLogLevel(config.logLevel);
	const reply = (message: WorkerReply) => port.postMessage(message);

	let session: ModelSession | null = null;
	try {
		session = await loadSession(config);
	} catch (error) {
		log.error('model session failed to load', error, { modelPath: config.modelPath });
	}
	const engine = new DetectionEngine(session, {
		inputSize: { width: config.inputSize, height: config.inputSize },
		threshold: config.threshold,
	});

	port.on('message', (message: unknown) => {
		if (!isWorkerRequest(message)) {
			log.warn('unrecognized request ignored');
			return;
		}
		if (message.type === 'close') {
			void engine.release().then(
				() => port.close(),
				(error: unknown) => {
					log.error('model session release failed', error);
					port.close();
				}
			);
			return;
		}

		const { id, width, height, data } = message;
		void engine.detect({ width, height, channels: 3, data: new Uint8Array(data) }).then(
			(detections) => reply({ type: 'result', id, detections }),
			(error: unknown) => reply({ type: 'failed', id, message: errorMessage(error) })
		);
	});

	reply({ type: 'ready', available: engine.available });
}

const port = parentPort;
if (!port || !isWorkerConfig(workerData)) {
	throw new Error('inference worker needs a parent thread and a valid config');
}
await serve(port, workerData);
