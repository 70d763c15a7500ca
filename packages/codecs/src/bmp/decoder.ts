import {
	CodecError,
	createImageData,
	getRow,
	tryDecode,
	type DecodeResult,
	type ImageData,
} from '@imgconv/core'
import {
	BI_RGB,
	BMP_BITS_PER_PIXEL,
	BMP_PLANES,
	BMP_SIGNATURE,
	BYTES_PER_PIXEL,
	FILE_HEADER_SIZE,
	INFO_HEADER_SIZE,
	PIXEL_DATA_OFFSET,
	type BmpFileHeader,
	type BmpInfoHeader,
	bmpStride,
	readFileHeader,
	readInfoHeader,
} from './types'

export interface BmpHeaders {
	fileHeader: BmpFileHeader
	infoHeader: BmpInfoHeader
}

/**
 * Read both headers without validating them
 */
export function readBmpHeaders(data: Uint8Array): BmpHeaders {
	if (data.length < PIXEL_DATA_OFFSET) {
		throw new CodecError('io', `Truncated BMP header: ${data.length} of ${PIXEL_DATA_OFFSET} bytes`)
	}

	return {
		fileHeader: readFileHeader(data, 0),
		infoHeader: readInfoHeader(data, FILE_HEADER_SIZE),
	}
}

/**
 * Reject every header we cannot read as a 24-bit uncompressed bottom-up bitmap.
 * Checks run in a fixed order; the first violation wins.
 */
function validateHeaders({ fileHeader, infoHeader }: BmpHeaders): void {
	if (fileHeader.signature !== BMP_SIGNATURE) {
		throw new CodecError('format', 'Invalid BMP signature')
	}
	if (fileHeader.pixelDataOffset !== PIXEL_DATA_OFFSET) {
		throw new CodecError('format', `Unsupported pixel data offset: ${fileHeader.pixelDataOffset}`)
	}
	if (infoHeader.headerSize !== INFO_HEADER_SIZE) {
		throw new CodecError('format', `Unsupported DIB header size: ${infoHeader.headerSize}`)
	}
	if (infoHeader.colorPlanes !== BMP_PLANES) {
		throw new CodecError('format', `Unsupported color planes: ${infoHeader.colorPlanes}`)
	}
	if (infoHeader.bitsPerPixel !== BMP_BITS_PER_PIXEL) {
		throw new CodecError('format', `Unsupported bits per pixel: ${infoHeader.bitsPerPixel}`)
	}
	if (infoHeader.compression !== BI_RGB) {
		throw new CodecError('format', `Unsupported compression: ${infoHeader.compression}`)
	}
	if (infoHeader.width <= 0 || infoHeader.height <= 0) {
		throw new CodecError(
			'format',
			`Invalid dimensions: ${infoHeader.width}x${infoHeader.height}`
		)
	}
}

/**
 * Decode BMP bytes, throwing CodecError on the first problem
 */
function parseBmp(data: Uint8Array): ImageData {
	const headers = readBmpHeaders(data)
	validateHeaders(headers)

	const { width, height } = headers.infoHeader
	const stride = bmpStride(width)

	// Every row must be present in full, padding included
	const required = headers.fileHeader.pixelDataOffset + stride * height
	if (data.length < required) {
		throw new CodecError('io', `Truncated BMP pixel data: ${data.length} of ${required} bytes`)
	}

	const image = createImageData(width, height)

	let rowOffset = headers.fileHeader.pixelDataOffset
	for (let y = height - 1; y >= 0; y--) {
		const line = getRow(image, y)

		for (let x = 0; x < width; x++) {
			const src = rowOffset + x * BYTES_PER_PIXEL
			const dst = x * 3

			// BGR -> RGB
			line[dst] = data[src + 2]
			line[dst + 1] = data[src + 1]
			line[dst + 2] = data[src]
		}

		rowOffset += stride
	}

	return image
}

/**
 * Decode BMP file to ImageData
 */
export function decodeBmp(data: Uint8Array): DecodeResult {
	return tryDecode(() => parseBmp(data))
}
