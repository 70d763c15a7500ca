import { loadImageFile, saveImageFile } from '@imgconv/codecs'
import {
	CodecError,
	detectFormat,
	type EncodeOptions,
	type ImageData,
	type ImageFormat,
} from '@imgconv/core'
import { codecForPath, getCodec, saveImage } from './image'

/**
 * Conversion options
 */
export interface ConvertOptions {
	/** Output format, defaults to the input format */
	format?: ImageFormat
	/** Output quality (1-100, JPEG only) */
	quality?: number
}

/**
 * What happened to a file conversion
 */
export type ConvertOutcome =
	| { readonly status: 'converted'; readonly image: ImageData }
	| { readonly status: 'unknown-input-format' }
	| { readonly status: 'unknown-output-format' }
	| { readonly status: 'load-failed'; readonly error: CodecError }
	| { readonly status: 'save-failed'; readonly error: CodecError }

/**
 * Convert image bytes between formats. Throws a CodecError when the input
 * cannot be decoded or the image cannot be encoded.
 */
export function convert(input: Uint8Array, options: ConvertOptions = {}): Uint8Array {
	const inputFormat = detectFormat(input)
	if (!inputFormat) {
		throw new CodecError('format', 'Unknown or unsupported input format')
	}

	const loaded = getCodec(inputFormat).decode(input)
	if (!loaded.ok) throw loaded.error

	// Default output format to input format
	const outputFormat = options.format ?? inputFormat
	return saveImage(loaded.image, outputFormat, { quality: options.quality })
}

/**
 * Convert one image file into another, formats chosen by extension.
 * Both formats are resolved before the input is read.
 */
export function convertFile(
	inputPath: string,
	outputPath: string,
	options: EncodeOptions = {}
): ConvertOutcome {
	const inputCodec = codecForPath(inputPath)
	if (!inputCodec) return { status: 'unknown-input-format' }

	const outputCodec = codecForPath(outputPath)
	if (!outputCodec) return { status: 'unknown-output-format' }

	const loaded = loadImageFile(inputPath, inputCodec)
	if (!loaded.ok) return { status: 'load-failed', error: loaded.error }

	const saved = saveImageFile(outputPath, loaded.image, outputCodec, options)
	if (!saved.ok) return { status: 'save-failed', error: saved.error }

	return { status: 'converted', image: loaded.image }
}
