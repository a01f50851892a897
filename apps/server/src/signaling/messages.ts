import {
	NEGOTIATION_TYPES,
	type FrameMessage,
	type InboundMessage,
	type JoinRoomMessage,
	type NegotiationMessage,
	type NegotiationType,
	type OutboundMessage,
} from '@rtc-detect/shared';

export type IgnoredMessage = {
	type: 'ignored';
	reason: 'malformed' | 'unknown-type' | 'invalid-fields';
};

export type ParsedMessage = InboundMessage | IgnoredMessage;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNegotiationType(type: string): type is NegotiationType {
	return (NEGOTIATION_TYPES as readonly string[]).includes(type);
}

function ignored(reason: IgnoredMessage['reason']): IgnoredMessage {
	return { type: 'ignored', reason };
}

function parseFrame(record: JsonRecord): FrameMessage | IgnoredMessage {
	const { data, frame_id: frameId, capture_ts: captureTs } = record;
	if (typeof data !== 'string' || data.length === 0) return ignored('invalid-fields');

	const frame: FrameMessage = { type: 'frame', data };
	// senders number their frames; ids travel back as strings
	if (typeof frameId === 'string' && frameId.length > 0) frame.frame_id = frameId;
	else if (typeof frameId === 'number' && Number.isFinite(frameId)) frame.frame_id = String(frameId);
	if (typeof captureTs === 'number' && Number.isFinite(captureTs)) frame.capture_ts = captureTs;
	return frame;
}

function parseJoinRoom(record: JsonRecord): JoinRoomMessage {
	const { room_id: roomId } = record;
	return typeof roomId === 'string' && roomId.length > 0 ? { type: 'join_room', room_id: roomId } : { type: 'join_room' };
}

/**
 * Decodes one inbound text frame. Never throws: anything that is not a
 * recognizable message comes back as an `ignored` variant.
 */
export function parseInbound(text: string): ParsedMessage {
	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch {
		return ignored('malformed');
	}
	if (!isRecord(value)) return ignored('malformed');
	const type = value.type;
	if (typeof type !== 'string') return ignored('malformed');

	if (isNegotiationType(type)) {
		const negotiation: NegotiationMessage = { ...value, type };
		return negotiation;
	}
	switch (type) {
		case 'frame':
			return parseFrame(value);
		case 'join_room':
			return parseJoinRoom(value);
		case 'ping':
			return { type: 'ping' };
		default:
			return ignored('unknown-type');
	}
}

export function encodeOutbound(message: OutboundMessage): string {
	return JSON.stringify(message);
}
