import type { DecodeResult } from './result'

/**
 * Raw image data in RGB format
 * Each pixel is 3 bytes: R, G, B (0-255), rows top to bottom
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGB, length = width * height * 3
}

/**
 * 8-bit RGB color
 */
export interface Color {
	readonly r: number
	readonly g: number
	readonly b: number
}

export const BLACK: Color = { r: 0, g: 0, b: 0 }
export const WHITE: Color = { r: 255, g: 255, b: 255 }

/**
 * Bytes per pixel in ImageData
 */
export const CHANNELS = 3

/**
 * Supported image formats
 */
export type ImageFormat = 'bmp' | 'ppm' | 'jpeg'

/**
 * Encode options
 */
export interface EncodeOptions {
	quality?: number // 1-100, lossy formats only
}

/**
 * Codec interface for encoding/decoding
 *
 * `decode` reports malformed input through the result instead of throwing.
 * `encode` throws a CodecError when handed an invalid image.
 */
export interface ImageCodec {
	readonly format: ImageFormat
	decode(data: Uint8Array): DecodeResult
	encode(image: ImageData, options?: EncodeOptions): Uint8Array
}

/**
 * Create ImageData filled with a single color
 */
export function createImageData(width: number, height: number, fill: Color = BLACK): ImageData {
	const data = new Uint8Array(width * height * CHANNELS)
	if (fill.r !== 0 || fill.g !== 0 || fill.b !== 0) {
		for (let i = 0; i < data.length; i += CHANNELS) {
			data[i] = fill.r
			data[i + 1] = fill.g
			data[i + 2] = fill.b
		}
	}
	return { width, height, data }
}

/**
 * View of row y (width * 3 bytes). Writes go through to the image.
 */
export function getRow(image: ImageData, y: number): Uint8Array {
	const rowBytes = image.width * CHANNELS
	return image.data.subarray(y * rowBytes, (y + 1) * rowBytes)
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): Color {
	const idx = (y * image.width + x) * CHANNELS
	return { r: image.data[idx], g: image.data[idx + 1], b: image.data[idx + 2] }
}

/**
 * Set pixel at (x, y)
 */
export function setPixel(image: ImageData, x: number, y: number, color: Color): void {
	const idx = (y * image.width + x) * CHANNELS
	image.data[idx] = color.r
	image.data[idx + 1] = color.g
	image.data[idx + 2] = color.b
}

/**
 * An image is valid when both dimensions are positive integers and the
 * buffer holds exactly width * height pixels.
 */
export function isValidImage(image: ImageData): boolean {
	return (
		Number.isInteger(image.width) &&
		Number.isInteger(image.height) &&
		image.width > 0 &&
		image.height > 0 &&
		image.data.length === image.width * image.height * CHANNELS
	)
}
