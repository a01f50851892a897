import type { IncomingMessage, ServerResponse } from 'node:http';
import { errorMessage } from '../errors';
import { createLogger } from '../logging/logger';
import type { MetricsStore } from '../metrics/store';
import { parseSessionMetrics } from '../metrics/validate';

const log = createLogger('http');

export const MAX_BODY_BYTES = 1024 * 1024;

export type HealthSource = {
	onnxAvailable: boolean;
	modelLoaded: () => boolean;
	rooms: () => number;
	clients: () => number;
};

export type ApiDeps = {
	health: HealthSource;
	metrics: MetricsStore;
	now?: () => Date;
};

class BodyError extends Error {
	constructor(
		readonly status: number,
		message: string
	) {
		super(message);
		this.name = 'BodyError';
	}
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
	const text = JSON.stringify(body);
	res.writeHead(status, {
		'content-type': 'application/json; charset=utf-8',
		'content-length': Buffer.byteLength(text),
	});
	res.end(text);
}

async function readJson(req: IncomingMessage): Promise<unknown> {
	const chunks: Buffer[] = [];
	let size = 0;
	// oversized bodies are still drained so the client gets to read the 413
	for await (const chunk of req) {
		const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buf.length;
		if (size <= MAX_BODY_BYTES) chunks.push(buf);
	}
	if (size > MAX_BODY_BYTES) throw new BodyError(413, 'request body too large');
	try {
		return JSON.parse(Buffer.concat(chunks).toString('utf8'));
	} catch {
		throw new BodyError(400, 'request body is not valid JSON');
	}
}

type Handler = (req: IncomingMessage, res: ServerResponse, params: string[]) => Promise<void>;
type Route = { method: string; pattern: RegExp; handler: Handler };

/**
 * Builds the request listener for the `/api` routes. Upgrades to `/ws`
 * never reach it; the server hands those to the WebSocket layer.
 */
export function createApiHandler(deps: ApiDeps): (req: IncomingMessage, res: ServerResponse) => void {
	const now = deps.now ?? (() => new Date());

	const routes: Route[] = [
		{
			method: 'GET',
			pattern: /^\/api\/?$/,
			handler: async (_req, res) => {
				sendJson(res, 200, { message: 'WebRTC Object Detection System', status: 'running' });
			},
		},
		{
			method: 'GET',
			pattern: /^\/api\/health\/?$/,
			handler: async (_req, res) => {
				const { health } = deps;
				sendJson(res, 200, {
					status: 'healthy',
					onnx_available: health.onnxAvailable,
					model_loaded: health.modelLoaded(),
					rooms: health.rooms(),
					clients: health.clients(),
					timestamp: now().toISOString(),
				});
			},
		},
		{
			method: 'POST',
			pattern: /^\/api\/metrics\/?$/,
			handler: async (req, res) => {
				const parsed = parseSessionMetrics(await readJson(req));
				if (!parsed.ok) {
					sendJson(res, 422, { detail: parsed.errors });
					return;
				}
				const stored = await deps.metrics.save(parsed.value);
				log.info('metrics stored', { sessionId: stored.session_id, id: stored.id });
				sendJson(res, 200, stored);
			},
		},
		{
			method: 'GET',
			pattern: /^\/api\/metrics\/([^/]+)\/?$/,
			handler: async (_req, res, [sessionId]) => {
				sendJson(res, 200, await deps.metrics.listBySession(decodeURIComponent(sessionId)));
			},
		},
	];

	const dispatch = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
		const { pathname } = new URL(req.url ?? '/', 'http://localhost');
		for (const route of routes) {
			if (route.method !== req.method) continue;
			const match = route.pattern.exec(pathname);
			if (match) {
				await route.handler(req, res, match.slice(1));
				return;
			}
		}
		sendJson(res, 404, { detail: 'Not Found' });
	};

	return (req, res) => {
		dispatch(req, res).catch((error: unknown) => {
			if (error instanceof BodyError) {
				sendJson(res, error.status, { detail: error.message });
				return;
			}
			log.error('request failed', error, { method: req.method, url: req.url });
			if (res.headersSent) res.destroy();
			else sendJson(res, 500, { detail: errorMessage(error) });
		});
	};
}
