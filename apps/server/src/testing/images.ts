import sharp from 'sharp';

/** Encodes raw RGB pixels as a base64 PNG data URI. */
export async function pngDataUri(width: number, height: number, rgb: Uint8Array): Promise<string> {
	const png = await sharp(Buffer.from(rgb), { raw: { width, height, channels: 3 } }).png().toBuffer();
	return `data:image/png;base64,${png.toString('base64')}`;
}

export function checkerboard(width: number, height: number): Uint8Array {
	const data = new Uint8Array(width * height * 3);
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const v = (x + y) % 2 === 0 ? 255 : 0;
			data.set([v, v, v], (y * width + x) * 3);
		}
	}
	return data;
}

export const CORRUPT_FRAME = `data:image/jpeg;base64,${Buffer.from('definitely not a jpeg').toString('base64')}`;
