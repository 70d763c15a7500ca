import { CodecError, getRow, isValidImage, type ImageData } from '@imgconv/core'
import { PpmFormat } from './types'

function assertValid(image: ImageData): void {
	if (!isValidImage(image)) {
		throw new CodecError('format', `Invalid image: ${image.width}x${image.height}`)
	}
}

function header(format: PpmFormat, image: ImageData): string {
	return `${format}\n${image.width} ${image.height}\n255\n`
}

/**
 * Encode ImageData to PPM (P6 binary format)
 */
export function encodePpm(image: ImageData): Uint8Array {
	assertValid(image)

	const headerBytes = new TextEncoder().encode(header(PpmFormat.BINARY, image))

	// ImageData is already packed RGB, row-major, top to bottom
	const output = new Uint8Array(headerBytes.length + image.data.length)
	output.set(headerBytes, 0)
	output.set(image.data, headerBytes.length)

	return output
}

/**
 * Encode ImageData to PPM (P3 ASCII format), one image row per line
 */
export function encodePpmAscii(image: ImageData): Uint8Array {
	assertValid(image)

	const lines = [header(PpmFormat.ASCII, image).trimEnd()]
	for (let y = 0; y < image.height; y++) {
		lines.push(getRow(image, y).join(' '))
	}

	return new TextEncoder().encode(`${lines.join('\n')}\n`)
}
