// Shared wire types for signaling, frames and detections

export type Role = 'host' | 'phone' | 'unassigned';

export const DEFAULT_ROOM_ID = 'default';

export type Detection = {
	label: string;
	score: number; // 0..1
	xmin: number; // normalized 0..1 of the original frame
	ymin: number; // normalized 0..1
	xmax: number; // normalized 0..1
	ymax: number; // normalized 0..1
};

export type InferenceResult = {
	frame_id: string;
	capture_ts: number;
	recv_ts: number; // server clock when the frame was accepted
	inference_ts: number; // server clock right before the model ran
	detections: Detection[];
	error?: string;
};

// ---- inbound (client -> server) ----

export const NEGOTIATION_TYPES = ['offer', 'answer', 'ice-candidate'] as const;
export type NegotiationType = (typeof NEGOTIATION_TYPES)[number];

export type NegotiationMessage = {
	type: NegotiationType;
	// sdp / candidate / addressing hints are opaque to the relay
	[key: string]: unknown;
};

export type FrameMessage = {
	type: 'frame';
	data: string; // base64 image, optionally a data: URI
	frame_id?: string;
	capture_ts?: number;
};

export type JoinRoomMessage = {
	type: 'join_room';
	room_id?: string;
};

export type PingMessage = {
	type: 'ping';
};

export type InboundMessage = NegotiationMessage | FrameMessage | JoinRoomMessage | PingMessage;

// ---- outbound (server -> client) ----

export type DetectionMessage = InferenceResult & {
	type: 'detection';
};

export type RoomJoinedMessage = {
	type: 'room_joined';
	room_id: string;
	client_id: string;
	client_type: Role;
};

export type PongMessage = {
	type: 'pong';
	timestamp: number;
};

export type OutboundMessage = DetectionMessage | RoomJoinedMessage | PongMessage;

// ---- metrics ----

export type LatencySummary = {
	median: number;
	p95: number;
};

export type SessionMetrics = {
	session_id: string;
	frame_count: number;
	processed_fps: number;
	median_e2e_latency: number;
	p95_e2e_latency: number;
	uplink_kbps: number;
	downlink_kbps: number;
};

export type StoredSessionMetrics = SessionMetrics & {
	id: string;
	timestamp: string; // ISO-8601
};
