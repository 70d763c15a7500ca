import type { DecodeResult, ImageCodec, ImageData } from '@imgconv/core'
import { decodePpm } from './decoder'
import { encodePpm } from './encoder'

/**
 * PPM (Portable Pixmap) codec - decodes P3 and P6, encodes P6
 */
export const PpmCodec: ImageCodec = {
	format: 'ppm',

	decode(data: Uint8Array): DecodeResult {
		return decodePpm(data)
	},

	encode(image: ImageData): Uint8Array {
		return encodePpm(image)
	},
}
