import sharp from 'sharp';
import { DecodeError } from '../errors';
import type { RawImage } from './letterbox';

/** Drops a `data:image/...;base64,` style envelope if present. */
export function stripEnvelope(payload: string): string {
	const comma = payload.indexOf(',');
	return comma >= 0 ? payload.slice(comma + 1) : payload;
}

function toRgb(data: Buffer, width: number, height: number, channels: number): Uint8Array {
	if (channels === 3) return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
	if (channels !== 1) throw new DecodeError(`unsupported channel count ${channels}`);
	const rgb = new Uint8Array(width * height * 3);
	for (let i = 0; i < width * height; i++) {
		rgb[i * 3] = rgb[i * 3 + 1] = rgb[i * 3 + 2] = data[i];
	}
	return rgb;
}

/**
 * Transport payload (base64, optionally a data URI) -> interleaved RGB pixels.
 * Throws DecodeError when the bytes are not an image sharp can read.
 */
export async function decodeFrame(payload: string): Promise<RawImage> {
	const bytes = Buffer.from(stripEnvelope(payload).trim(), 'base64');
	if (bytes.length === 0) {
		throw new DecodeError('Failed to decode image: empty payload');
	}

	try {
		const { data, info } = await sharp(bytes)
			.removeAlpha()
			.toColourspace('srgb')
			.raw()
			.toBuffer({ resolveWithObject: true });
		return {
			width: info.width,
			height: info.height,
			channels: 3,
			data: toRgb(data, info.width, info.height, info.channels),
		};
	} catch (error) {
		if (error instanceof DecodeError) throw error;
		throw new DecodeError('Failed to decode image', error);
	}
}
