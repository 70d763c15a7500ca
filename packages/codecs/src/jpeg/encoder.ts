import { CodecError, isValidImage, type EncodeOptions, type ImageData } from '@imgconv/core'
import jpeg from 'jpeg-js'

export const DEFAULT_QUALITY = 90

/**
 * Encode ImageData to baseline JPEG
 */
export function encodeJpeg(image: ImageData, options?: EncodeOptions): Uint8Array {
	if (!isValidImage(image)) {
		throw new CodecError('format', `Invalid image: ${image.width}x${image.height}`)
	}

	const quality = options?.quality ?? DEFAULT_QUALITY
	if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
		throw new CodecError('format', `JPEG quality must be an integer from 1 to 100, got ${quality}`)
	}

	const { width, height, data } = image

	// RGB -> RGBA
	const rgba = new Uint8Array(width * height * 4)
	for (let src = 0, dst = 0; src < data.length; src += 3, dst += 4) {
		rgba[dst] = data[src]
		rgba[dst + 1] = data[src + 1]
		rgba[dst + 2] = data[src + 2]
		rgba[dst + 3] = 255
	}

	const encoded = jpeg.encode({ width, height, data: rgba }, quality)
	return new Uint8Array(encoded.data.buffer, encoded.data.byteOffset, encoded.data.byteLength)
}
