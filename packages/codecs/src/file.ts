import { readFileSync, writeFileSync } from 'node:fs'
import {
	CodecError,
	failed,
	getErrorMessage,
	type DecodeResult,
	type EncodeOptions,
	type ImageCodec,
	type ImageData,
	type SaveResult,
} from '@imgconv/core'

/**
 * Read a whole file. The handle is opened and closed inside the call.
 */
export function readBytes(path: string): Uint8Array {
	try {
		return readFileSync(path)
	} catch (err) {
		throw new CodecError('io', `Cannot read ${path}: ${getErrorMessage(err)}`, { cause: err })
	}
}

/**
 * Create or truncate a file and write all bytes to it
 */
export function writeBytes(path: string, bytes: Uint8Array): void {
	try {
		writeFileSync(path, bytes)
	} catch (err) {
		throw new CodecError('io', `Cannot write ${path}: ${getErrorMessage(err)}`, { cause: err })
	}
}

/**
 * Load an image file with the given codec
 */
export function loadImageFile(path: string, codec: ImageCodec): DecodeResult {
	let bytes: Uint8Array
	try {
		bytes = readBytes(path)
	} catch (err) {
		if (err instanceof CodecError) return failed(err)
		throw err
	}
	return codec.decode(bytes)
}

/**
 * Encode an image with the given codec and write it to path
 */
export function saveImageFile(
	path: string,
	image: ImageData,
	codec: ImageCodec,
	options?: EncodeOptions
): SaveResult {
	try {
		writeBytes(path, codec.encode(image, options))
		return { ok: true }
	} catch (err) {
		if (err instanceof CodecError) return failed(err)
		throw err
	}
}
