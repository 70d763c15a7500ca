/**
 * PPM (Portable Pixmap) format types and constants
 */

export enum PpmFormat {
	ASCII = 'P3',
	BINARY = 'P6',
}

/**
 * PPM header structure
 */
export interface PpmHeader {
	format: PpmFormat
	width: number
	height: number
	maxVal: number // 1-65535; samples above 255 take two bytes in P6
}

export const MAX_MAXVAL = 65535

/**
 * Check if format is ASCII (text)
 */
export function isAsciiFormat(format: PpmFormat): boolean {
	return format === PpmFormat.ASCII
}

/**
 * Bytes per sample in binary data
 */
export function bytesPerSample(maxVal: number): number {
	return maxVal > 255 ? 2 : 1
}
