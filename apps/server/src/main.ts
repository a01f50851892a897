import { loadConfig } from './config';
import { InferenceThreadPool } from './detection/thread-pool';
import { ConfigError } from './errors';
import { createLogger, setLogLevel } from './logging/logger';
import { InMemoryMetricsStore } from './metrics/store';
import { FramePipeline } from './pipeline/frame-pipeline';
import { RoomRegistry } from './rooms/registry';
import { createRelayServer } from './server';
import { SignalingRelay } from './signaling/relay';

const log = createLogger('main');

async function main(): Promise<void> {
	const config = loadConfig();
	setLogLevel(config.logLevel);

	const detector = await InferenceThreadPool.start(
		{
			modelPath: config.modelPath,
			numThreads: config.ortNumThreads,
			inputSize: config.modelInputSize,
			threshold: config.confidenceThreshold,
			logLevel: config.logLevel,
		},
		config.inferenceWorkers
	);
	if (!detector.available) {
		log.warn('running without detection: frames get empty results', { modelPath: config.modelPath });
	}

	const pipeline = new FramePipeline(detector, {
		workers: config.inferenceWorkers,
		timeoutMs: config.frameTimeoutMs,
	});
	const relay = new SignalingRelay({ registry: new RoomRegistry(), pipeline });
	const server = createRelayServer({
		relay,
		pipeline,
		metrics: new InMemoryMetricsStore(),
		health: { onnxAvailable: true, modelLoaded: () => detector.available },
		releaseModel: () => detector.release(),
	});

	await server.listen(config.port, config.host);

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals) => {
		if (stopping) return;
		stopping = true;
		log.info('shutting down', { signal });
		server.close().then(
			() => process.exit(0),
			(error: unknown) => {
				log.error('shutdown failed', error);
				process.exit(1);
			}
		);
	};
	process.on('SIGINT', shutdown);
	process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
	if (error instanceof ConfigError) {
		log.error(error.message);
	} else {
		log.error('server failed to start', error);
	}
	process.exit(1);
});
