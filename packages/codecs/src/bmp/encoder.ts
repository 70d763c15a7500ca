import { CodecError, getRow, isValidImage, type ImageData } from '@imgconv/core'
import {
	BYTES_PER_PIXEL,
	FILE_HEADER_SIZE,
	PIXEL_DATA_OFFSET,
	bmpStride,
	createFileHeader,
	createInfoHeader,
	writeFileHeader,
	writeInfoHeader,
} from './types'

/**
 * Encode ImageData to BMP format (24-bit BGR, uncompressed, bottom-up)
 */
export function encodeBmp(image: ImageData): Uint8Array {
	if (!isValidImage(image)) {
		throw new CodecError('format', `Invalid image: ${image.width}x${image.height}`)
	}

	const { width, height } = image
	const stride = bmpStride(width)
	const imageDataSize = stride * height

	const fileHeader = createFileHeader({ fileSize: PIXEL_DATA_OFFSET + imageDataSize })
	const infoHeader = createInfoHeader({ width, height, imageDataSize })

	// Zero-filled, so row padding is deterministic
	const output = new Uint8Array(PIXEL_DATA_OFFSET + imageDataSize)
	writeFileHeader(output, 0, fileHeader)
	writeInfoHeader(output, FILE_HEADER_SIZE, infoHeader)

	// Bottom row first
	let rowOffset = PIXEL_DATA_OFFSET
	for (let y = height - 1; y >= 0; y--) {
		const line = getRow(image, y)

		for (let x = 0; x < width; x++) {
			const src = x * 3
			const dst = rowOffset + x * BYTES_PER_PIXEL

			// RGB -> BGR
			output[dst] = line[src + 2]
			output[dst + 1] = line[src + 1]
			output[dst + 2] = line[src]
		}

		rowOffset += stride
	}

	return output
}
