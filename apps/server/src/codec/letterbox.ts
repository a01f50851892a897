/**
 * Letterbox geometry: aspect-preserving resize into the model's fixed input,
 * padded with a neutral color, plus the inverse transform for boxes.
 */

export type RawImage = {
	width: number;
	height: number;
	channels: 3; // interleaved RGB
	data: Uint8Array;
};

export type Box = {
	xmin: number;
	ymin: number;
	xmax: number;
	ymax: number;
};

export type LetterboxGeometry = {
	scale: number;
	pad: { left: number; top: number };
	source: { width: number; height: number };
};

export type LetterboxResult = LetterboxGeometry & {
	image: RawImage;
};

export const PAD_VALUE = 114;

export function letterboxGeometry(srcW: number, srcH: number, targetH: number, targetW: number): LetterboxGeometry & { drawW: number; drawH: number } {
	if (srcW < 1 || srcH < 1 || targetW < 1 || targetH < 1) {
		throw new RangeError(`letterbox needs positive sizes, got ${srcW}x${srcH} -> ${targetW}x${targetH}`);
	}
	const scale = Math.min(targetW / srcW, targetH / srcH);
	const drawW = Math.max(1, Math.floor(srcW * scale));
	const drawH = Math.max(1, Math.floor(srcH * scale));
	const left = Math.floor((targetW - drawW) / 2);
	const top = Math.floor((targetH - drawH) / 2);
	return { scale, pad: { left, top }, source: { width: srcW, height: srcH }, drawW, drawH };
}

export function letterbox(image: RawImage, targetH: number, targetW: number): LetterboxResult {
	const { scale, pad, source, drawW, drawH } = letterboxGeometry(image.width, image.height, targetH, targetW);

	const out = new Uint8Array(targetW * targetH * 3).fill(PAD_VALUE);
	const src = image.data;
	const srcW = image.width;
	const srcH = image.height;
	const ratioX = srcW / drawW;
	const ratioY = srcH / drawH;

	// bilinear, sampling pixel centers
	for (let y = 0; y < drawH; y++) {
		const sy = Math.min(srcH - 1, Math.max(0, (y + 0.5) * ratioY - 0.5));
		const y0 = Math.floor(sy);
		const y1 = Math.min(srcH - 1, y0 + 1);
		const fy = sy - y0;
		for (let x = 0; x < drawW; x++) {
			const sx = Math.min(srcW - 1, Math.max(0, (x + 0.5) * ratioX - 0.5));
			const x0 = Math.floor(sx);
			const x1 = Math.min(srcW - 1, x0 + 1);
			const fx = sx - x0;

			const o = ((y + pad.top) * targetW + (x + pad.left)) * 3;
			const p00 = (y0 * srcW + x0) * 3;
			const p01 = (y0 * srcW + x1) * 3;
			const p10 = (y1 * srcW + x0) * 3;
			const p11 = (y1 * srcW + x1) * 3;
			for (let c = 0; c < 3; c++) {
				const top = src[p00 + c] * (1 - fx) + src[p01 + c] * fx;
				const bottom = src[p10 + c] * (1 - fx) + src[p11 + c] * fx;
				out[o + c] = Math.round(top * (1 - fy) + bottom * fy);
			}
		}
	}

	return {
		image: { width: targetW, height: targetH, channels: 3, data: out },
		scale,
		pad,
		source,
	};
}

/** Original-image pixels -> model-input pixels. */
export function projectBox(box: Box, geometry: LetterboxGeometry): Box {
	const { scale, pad } = geometry;
	return {
		xmin: box.xmin * scale + pad.left,
		ymin: box.ymin * scale + pad.top,
		xmax: box.xmax * scale + pad.left,
		ymax: box.ymax * scale + pad.top,
	};
}

function clamp(value: number, lo: number, hi: number): number {
	return Math.min(hi, Math.max(lo, value));
}

/**
 * Model-input pixels -> original image, normalized to [0, 1].
 * Corners are reordered before clamping so the result always satisfies
 * xmin <= xmax and ymin <= ymax.
 */
export function unletterbox(box: Box, geometry: LetterboxGeometry): Box {
	const { scale, pad, source } = geometry;
	const x1 = (box.xmin - pad.left) / scale;
	const x2 = (box.xmax - pad.left) / scale;
	const y1 = (box.ymin - pad.top) / scale;
	const y2 = (box.ymax - pad.top) / scale;

	return {
		xmin: clamp(Math.min(x1, x2), 0, source.width) / source.width,
		ymin: clamp(Math.min(y1, y2), 0, source.height) / source.height,
		xmax: clamp(Math.max(x1, x2), 0, source.width) / source.width,
		ymax: clamp(Math.max(y1, y2), 0, source.height) / source.height,
	};
}

/** HWC uint8 RGB -> NCHW float32 in [0, 1]. */
export function toTensorData(image: RawImage): Float32Array {
	const plane = image.width * image.height;
	const floatData = new Float32Array(3 * plane);
	const { data } = image;
	for (let i = 0; i < plane; i++) {
		floatData[i] = data[i * 3] / 255;
		floatData[i + plane] = data[i * 3 + 1] / 255;
		floatData[i + plane * 2] = data[i * 3 + 2] / 255;
	}
	return floatData;
}
