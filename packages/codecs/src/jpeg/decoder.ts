import { CodecError, getErrorMessage, tryDecode, type DecodeResult } from '@imgconv/core'
import jpeg from 'jpeg-js'

/**
 * Decode JPEG to ImageData. jpeg-js yields RGBA; alpha is always opaque and is dropped.
 */
export function decodeJpeg(data: Uint8Array): DecodeResult {
	return tryDecode(() => {
		let raw: { width: number; height: number; data: Uint8Array }
		try {
			raw = jpeg.decode(data, { useTArray: true })
		} catch (err) {
			throw new CodecError('format', `Invalid JPEG: ${getErrorMessage(err)}`, { cause: err })
		}

		const { width, height } = raw
		if (width <= 0 || height <= 0) {
			throw new CodecError('format', `Invalid JPEG dimensions: ${width}x${height}`)
		}

		const output = new Uint8Array(width * height * 3)
		for (let src = 0, dst = 0; dst < output.length; src += 4, dst += 3) {
			output[dst] = raw.data[src]
			output[dst + 1] = raw.data[src + 1]
			output[dst + 2] = raw.data[src + 2]
		}

		return { width, height, data: output }
	})
}
