import { createServer, type Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { createApiHandler, type HealthSource } from './http/routes';
import { createLogger } from './logging/logger';
import type { MetricsStore } from './metrics/store';
import type { FramePipeline } from './pipeline/frame-pipeline';
import { WebSocketChannel } from './signaling/channel';
import type { SignalingRelay } from './signaling/relay';

const log = createLogger('server');

const WS_PATH = /^\/ws\/([^/]+)\/?$/;

export type RelayServerOptions = {
	relay: SignalingRelay;
	pipeline: FramePipeline;
	metrics: MetricsStore;
	health: Pick<HealthSource, 'onnxAvailable' | 'modelLoaded'>;
	// releases the model once every frame has drained
	releaseModel?: () => Promise<void>;
	heartbeatMs?: number; // 0 disables
};

export type RelayServer = {
	readonly httpServer: Server;
	listen(port: number, host?: string): Promise<number>;
	close(): Promise<void>;
};

function rejectUpgrade(socket: Duplex, status: number, text: string): void {
	socket.end(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

function textOf(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
	if (Buffer.isBuffer(data)) return data.toString('utf8');
	return Buffer.from(data).toString('utf8');
}

/**
 * One HTTP server carrying both the `/api` routes and the `/ws/{client_id}`
 * WebSocket endpoint.
 */
export function createRelayServer(options: RelayServerOptions): RelayServer {
	const { relay, pipeline } = options;
	const wss = new WebSocketServer({ noServer: true });
	const alive = new WeakSet<WebSocket>();

	const httpServer = createServer(
		createApiHandler({
			metrics: options.metrics,
			health: {
				...options.health,
				rooms: () => relay.registry.roomCount,
				clients: () => relay.registry.clientCount,
			},
		})
	);

	httpServer.on('upgrade', (req, socket, head) => {
		const url = new URL(req.url ?? '/', 'http://localhost');
		const match = WS_PATH.exec(url.pathname);
		if (!match) {
			rejectUpgrade(socket, 404, 'Not Found');
			return;
		}
		let clientId: string;
		try {
			clientId = decodeURIComponent(match[1]);
		} catch {
			rejectUpgrade(socket, 400, 'Bad Request');
			return;
		}
		const roomId = url.searchParams.get('room_id') ?? undefined;
		wss.handleUpgrade(req, socket, head, (ws) => attach(ws, clientId, roomId));
	});

	function attach(ws: WebSocket, clientId: string, roomId: string | undefined): void {
		const connection = relay.connect(clientId, roomId, new WebSocketChannel(ws));
		alive.add(ws);

		ws.on('pong', () => alive.add(ws));
		ws.on('message', (data, isBinary) => {
			if (isBinary) {
				log.debug('binary message ignored', { clientId });
				return;
			}
			connection.receive(textOf(data));
		});
		ws.on('close', (code) => connection.disconnect(`socket closed (${code})`));
		ws.on('error', (error) => {
			log.warn('socket error', { clientId, reason: error.message });
			connection.disconnect('socket error');
		});
	}

	let heartbeat: NodeJS.Timeout | undefined;
	const heartbeatMs = options.heartbeatMs ?? 30_000;
	if (heartbeatMs > 0) {
		heartbeat = setInterval(() => {
			for (const ws of wss.clients) {
				if (!alive.has(ws)) {
					ws.terminate();
					continue;
				}
				alive.delete(ws);
				ws.ping();
			}
		}, heartbeatMs);
		heartbeat.unref();
	}

	let closing: Promise<void> | undefined;
	async function shutdown(): Promise<void> {
		if (heartbeat) clearInterval(heartbeat);
		relay.closeAll();
		const httpClosed = new Promise<void>((resolve, reject) => {
			httpServer.close((error) => (error ? reject(error) : resolve()));
		});
		httpServer.closeAllConnections();
		await new Promise<void>((resolve) => wss.close(() => resolve()));
		await pipeline.close();
		if (options.releaseModel) await options.releaseModel();
		await httpClosed.catch((error: unknown) => {
			log.debug('http server was not listening', { reason: String(error) });
		});
		log.info('server stopped');
	}

	return {
		httpServer,

		listen(port, host) {
			return new Promise((resolve, reject) => {
				httpServer.once('error', reject);
				httpServer.listen(port, host, () => {
					httpServer.off('error', reject);
					const address = httpServer.address();
					const bound = address !== null && typeof address !== 'string' ? address.port : port;
					log.info('listening', { host, port: bound });
					resolve(bound);
				});
			});
		},

		close() {
			closing ??= shutdown();
			return closing;
		},
	};
}
