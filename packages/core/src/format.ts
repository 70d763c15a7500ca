import type { ImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, readonly (readonly number[])[]> = {
	bmp: [[0x42, 0x4d]], // "BM"
	ppm: [
		[0x50, 0x36], // "P6"
		[0x50, 0x33], // "P3"
	],
	jpeg: [[0xff, 0xd8, 0xff]],
}

/**
 * File extensions per format, lowercase, without the dot
 */
const EXTENSIONS: Record<ImageFormat, readonly string[]> = {
	bmp: ['bmp'],
	ppm: ['ppm'],
	jpeg: ['jpg', 'jpeg'],
}

const FORMATS: readonly ImageFormat[] = ['bmp', 'ppm', 'jpeg']

/**
 * Check if bytes start with a magic signature
 */
function matchMagic(data: Uint8Array, bytes: readonly number[]): boolean {
	if (data.length < bytes.length) return false
	return bytes.every((byte, i) => data[i] === byte)
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	for (const format of FORMATS) {
		if (MAGIC_BYTES[format].some((bytes) => matchMagic(data, bytes))) return format
	}
	return null
}

/**
 * Detect format from a file path's extension (case-insensitive)
 */
export function formatFromPath(path: string): ImageFormat | null {
	const name = path.slice(Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\')) + 1)
	const dot = name.lastIndexOf('.')
	if (dot <= 0) return null

	const ext = name.slice(dot + 1).toLowerCase()
	return FORMATS.find((format) => EXTENSIONS[format].includes(ext)) ?? null
}
