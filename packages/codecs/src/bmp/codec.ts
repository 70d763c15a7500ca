import type { DecodeResult, ImageCodec, ImageData, SaveResult } from '@imgconv/core'
import { loadImageFile, saveImageFile } from '../file'
import { decodeBmp } from './decoder'
import { encodeBmp } from './encoder'

/**
 * BMP codec implementation
 */
export const BmpCodec: ImageCodec = {
	format: 'bmp',

	decode(data: Uint8Array): DecodeResult {
		return decodeBmp(data)
	},

	encode(image: ImageData): Uint8Array {
		return encodeBmp(image)
	},
}

/**
 * Write image to path as BMP, creating or truncating the file
 */
export function saveBmp(path: string, image: ImageData): SaveResult {
	return saveImageFile(path, image, BmpCodec)
}

/**
 * Load a BMP file
 */
export function loadBmp(path: string): DecodeResult {
	return loadImageFile(path, BmpCodec)
}
