import { describe, it, expect } from 'vitest';
import { encodeOutbound, parseInbound } from './messages';

describe('parseInbound', () => {
	it('keeps negotiation payloads intact', () => {
		const text = JSON.stringify({ type: 'offer', sdp: 'v=0', target: 'b', extra: { nested: [1, 2] } });
		expect(parseInbound(text)).toEqual({ type: 'offer', sdp: 'v=0', target: 'b', extra: { nested: [1, 2] } });
		expect(parseInbound('{"type":"ice-candidate","candidate":null}')).toEqual({ type: 'ice-candidate', candidate: null });
		expect(parseInbound('{"type":"answer"}')).toEqual({ type: 'answer' });
	});

	it('reads frame fields and drops invalid optional ones', () => {
		expect(parseInbound('{"type":"frame","data":"abc","frame_id":"f1","capture_ts":100}')).toEqual({
			type: 'frame',
			data: 'abc',
			frame_id: 'f1',
			capture_ts: 100,
		});
		expect(parseInbound('{"type":"frame","data":"abc","frame_id":7}')).toEqual({ type: 'frame', data: 'abc', frame_id: '7' });
		expect(parseInbound('{"type":"frame","data":"abc","frame_id":{},"capture_ts":"soon"}')).toEqual({
			type: 'frame',
			data: 'abc',
		});
	});

	it('ignores a frame without image data', () => {
		expect(parseInbound('{"type":"frame","frame_id":"f1"}')).toEqual({ type: 'ignored', reason: 'invalid-fields' });
		expect(parseInbound('{"type":"frame","data":""}')).toEqual({ type: 'ignored', reason: 'invalid-fields' });
	});

	it('reads join_room with and without a target room', () => {
		expect(parseInbound('{"type":"join_room","room_id":"r9"}')).toEqual({ type: 'join_room', room_id: 'r9' });
		expect(parseInbound('{"type":"join_room","room_id":42}')).toEqual({ type: 'join_room' });
	});

	it('reads ping regardless of extra fields', () => {
		expect(parseInbound('{"type":"ping","timestamp":5}')).toEqual({ type: 'ping' });
	});

	it('marks unparseable text as malformed', () => {
		expect(parseInbound('not json')).toEqual({ type: 'ignored', reason: 'malformed' });
		expect(parseInbound('[1,2]')).toEqual({ type: 'ignored', reason: 'malformed' });
		expect(parseInbound('null')).toEqual({ type: 'ignored', reason: 'malformed' });
		expect(parseInbound('{"kind":"offer"}')).toEqual({ type: 'ignored', reason: 'malformed' });
		expect(parseInbound('{"type":3}')).toEqual({ type: 'ignored', reason: 'malformed' });
	});

	it('marks unrecognized types as unknown', () => {
		expect(parseInbound('{"type":"hello"}')).toEqual({ type: 'ignored', reason: 'unknown-type' });
	});
});

describe('encodeOutbound', () => {
	it('writes compact JSON', () => {
		expect(encodeOutbound({ type: 'pong', timestamp: 12 })).toBe('{"type":"pong","timestamp":12}');
	});
});
