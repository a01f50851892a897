import { randomUUID } from 'node:crypto';
import type { FrameMessage, InferenceResult, JoinRoomMessage, OutboundMessage } from '@rtc-detect/shared';
import { errorMessage } from '../errors';
import { createLogger } from '../logging/logger';
import type { FramePipeline } from '../pipeline/frame-pipeline';
import type { RoomRegistry } from '../rooms/registry';
import type { ClientChannel } from './channel';
import { encodeOutbound, parseInbound } from './messages';

const log = createLogger('signaling');

// close codes sent to sockets the relay drops on its own
export const CLOSE_SEND_FAILED = 1011;
export const CLOSE_SUPERSEDED = 4000;

export type RelayOptions = {
	registry: RoomRegistry;
	pipeline: FramePipeline;
	now?: () => number;
};

/**
 * One client's message loop. The transport feeds it text via `receive` and
 * reports the end of the socket via `disconnect`; everything else (room
 * addressing, frame offload, replies) happens here.
 */
export class Connection {
	private readonly frames = new AbortController();
	private ended = false;

	constructor(
		private readonly relay: SignalingRelay,
		readonly clientId: string,
		readonly channel: ClientChannel
	) {}

	/** True while the registry still routes this client id to this channel. */
	get live(): boolean {
		return !this.ended && this.relay.registry.route(this.clientId) === this.channel;
	}

	receive(text: string): void {
		if (!this.live) return;

		const message = parseInbound(text);
		switch (message.type) {
			case 'offer':
			case 'answer':
			case 'ice-candidate':
				this.relay.forward(this.clientId, text);
				break;
			case 'frame':
				this.handleFrame(message).catch((error: unknown) => {
					log.error('frame reply failed', error, { clientId: this.clientId });
				});
				break;
			case 'join_room':
				this.handleJoinRoom(message);
				break;
			case 'ping':
				this.reply({ type: 'pong', timestamp: this.relay.now() });
				break;
			case 'ignored':
				log.debug('message ignored', { clientId: this.clientId, reason: message.reason });
				break;
		}
	}

	disconnect(reason = 'closed'): void {
		if (this.ended) return;
		this.ended = true;
		this.frames.abort();
		this.relay.registry.leave(this.clientId, this.channel);
		this.relay.release(this);
		log.info('client disconnected', { clientId: this.clientId, reason });
	}

	private reply(message: OutboundMessage): void {
		this.relay.deliver(this.clientId, this.channel, encodeOutbound(message));
	}

	private handleJoinRoom(message: JoinRoomMessage): void {
		const { registry } = this.relay;
		const current = registry.roomOf(this.clientId);
		if (message.room_id && message.room_id !== current) {
			const role = registry.join(this.clientId, message.room_id, this.channel);
			log.info('client moved rooms', { clientId: this.clientId, from: current, roomId: message.room_id, role });
		}
		const roomId = registry.roomOf(this.clientId);
		if (roomId === undefined) return;
		this.reply({
			type: 'room_joined',
			room_id: roomId,
			client_id: this.clientId,
			client_type: registry.roleOf(this.clientId),
		});
	}

	private async handleFrame(message: FrameMessage): Promise<void> {
		let result: InferenceResult;
		try {
			result = await this.relay.pipeline.process({
				frameId: message.frame_id,
				captureTs: message.capture_ts,
				payload: message.data,
				signal: this.frames.signal,
			});
		} catch (error) {
			// pipeline shut down: still answer with a normally shaped, flagged reply
			const ts = this.relay.now();
			result = {
				frame_id: message.frame_id ?? randomUUID(),
				capture_ts: message.capture_ts ?? ts,
				recv_ts: ts,
				inference_ts: ts,
				detections: [],
				error: errorMessage(error),
			};
		}

		if (!this.live) {
			log.debug('dropping detection for departed client', { clientId: this.clientId, frameId: result.frame_id });
			return;
		}
		this.reply({ type: 'detection', ...result });
	}
}

/**
 * Relays negotiation messages between room members and answers frame,
 * room and liveness requests. Sends are best effort: a failed send drops
 * the recipient exactly like a disconnect.
 */
export class SignalingRelay {
	readonly registry: RoomRegistry;
	readonly pipeline: FramePipeline;
	readonly now: () => number;
	private readonly connections = new Map<ClientChannel, Connection>();

	constructor(options: RelayOptions) {
		this.registry = options.registry;
		this.pipeline = options.pipeline;
		this.now = options.now ?? Date.now;
	}

	get connectionCount(): number {
		return this.connections.size;
	}

	connect(clientId: string, roomId: string | undefined, channel: ClientChannel): Connection {
		const previous = this.registry.route(clientId);
		const role = this.registry.join(clientId, roomId, channel);
		if (previous && previous !== channel) {
			this.connections.get(previous)?.disconnect('superseded');
			previous.close(CLOSE_SUPERSEDED, 'superseded by a newer connection');
		}

		const connection = new Connection(this, clientId, channel);
		this.connections.set(channel, connection);
		log.info('client connected', { clientId, roomId: this.registry.roomOf(clientId), role });
		return connection;
	}

	/** Sends `text` unchanged to every other member of the sender's room. */
	forward(senderId: string, text: string): void {
		const roomId = this.registry.roomOf(senderId);
		if (roomId === undefined) return;
		for (const memberId of this.registry.members(roomId)) {
			if (memberId === senderId) continue;
			const channel = this.registry.route(memberId);
			if (channel) this.deliver(memberId, channel, text);
		}
	}

	deliver(clientId: string, channel: ClientChannel, text: string): void {
		channel.send(text).catch((error: unknown) => {
			log.warn('send failed, dropping client', { clientId, reason: errorMessage(error) });
			const connection = this.connections.get(channel);
			if (connection) connection.disconnect('send failed');
			else this.registry.leave(clientId, channel);
			channel.close(CLOSE_SEND_FAILED, 'send failed');
		});
	}

	release(connection: Connection): void {
		if (this.connections.get(connection.channel) === connection) {
			this.connections.delete(connection.channel);
		}
	}

	/** Closes every socket; used on shutdown. */
	closeAll(code = 1001, reason = 'server shutting down'): void {
		for (const connection of [...this.connections.values()]) {
			connection.disconnect('shutdown');
			connection.channel.close(code, reason);
		}
	}
}
