/**
 * Tape wire format: a stream of 3-byte groups. Pixel groups carry RGB bytes in
 * 0..254; a group whose last byte is 255 tells the firmware to render every
 * pixel received since the previous one.
 */

export interface Pixel {
	r: number;
	g: number;
	b: number;
}

export const BYTES_PER_PIXEL = 3;
export const MAX_CHANNEL_VALUE = 254;
export const SHOW_SENTINEL = 0xff;

export const CONTROL_TRIPLET: readonly number[] = [0x00, 0x00, SHOW_SENTINEL];

export const TAPE_BAUD_RATE = {
	NORMAL: 115_200,
	BOOTLOADER: 1_200
} as const;

export function clampChannel(value: number): number {
	if (Number.isNaN(value) || value < 0) {
		return 0;
	}
	if (value > MAX_CHANNEL_VALUE) {
		return MAX_CHANNEL_VALUE;
	}
	return Math.trunc(value);
}

export function encodePixel(r: number, g: number, b: number): Uint8Array {
	return new Uint8Array([clampChannel(r), clampChannel(g), clampChannel(b)]);
}

export function encodePixels(colors: readonly Pixel[]): Uint8Array {
	const out = new Uint8Array(colors.length * BYTES_PER_PIXEL);
	colors.forEach((color, index) => {
		out.set(encodePixel(color.r, color.g, color.b), index * BYTES_PER_PIXEL);
	});
	return out;
}

export function controlTriplet(): Uint8Array {
	return Uint8Array.from(CONTROL_TRIPLET);
}
