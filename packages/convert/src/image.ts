import { BmpCodec, JpegCodec, PpmCodec, loadImageFile, saveImageFile } from '@imgconv/codecs'
import {
	CodecError,
	detectFormat,
	failed,
	formatFromPath,
	type DecodeResult,
	type EncodeOptions,
	type ImageCodec,
	type ImageData,
	type ImageFormat,
	type SaveResult,
} from '@imgconv/core'

/**
 * Registry of available codecs
 */
const codecs: Record<ImageFormat, ImageCodec> = {
	bmp: BmpCodec,
	jpeg: JpegCodec,
	ppm: PpmCodec,
}

export function getCodec(format: ImageFormat): ImageCodec {
	return codecs[format]
}

/**
 * Codec chosen by file extension, or null when the extension is unknown
 */
export function codecForPath(path: string): ImageCodec | null {
	const format = formatFromPath(path)
	return format ? codecs[format] : null
}

/**
 * Load image from binary data, detecting the format from its magic bytes
 */
export function loadImage(data: Uint8Array): DecodeResult {
	const format = detectFormat(data)
	if (!format) {
		return failed(new CodecError('format', 'Unknown image format'))
	}
	return codecs[format].decode(data)
}

/**
 * Save image to binary data
 */
export function saveImage(image: ImageData, format: ImageFormat, options?: EncodeOptions): Uint8Array {
	return codecs[format].encode(image, options)
}

/**
 * Load an image file, picking the codec from its extension
 */
export function loadImageFromPath(path: string): DecodeResult {
	const codec = codecForPath(path)
	if (!codec) {
		return failed(new CodecError('format', `Unknown format of ${path}`))
	}
	return loadImageFile(path, codec)
}

/**
 * Save an image file, picking the codec from its extension
 */
export function saveImageToPath(path: string, image: ImageData, options?: EncodeOptions): SaveResult {
	const codec = codecForPath(path)
	if (!codec) {
		return failed(new CodecError('format', `Unknown format of ${path}`))
	}
	return saveImageFile(path, image, codec, options)
}
