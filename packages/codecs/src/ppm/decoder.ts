import {
	CodecError,
	createImageData,
	tryDecode,
	type DecodeResult,
	type ImageData,
} from '@imgconv/core'
import { MAX_MAXVAL, PpmFormat, type PpmHeader, bytesPerSample, isAsciiFormat } from './types'

const HASH = 0x23 // '#'
const LF = 0x0a

function isWhitespace(byte: number): boolean {
	// space, \t, \n, \v, \f, \r
	return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d)
}

function isDigit(byte: number): boolean {
	return byte >= 0x30 && byte <= 0x39
}

/**
 * Token reader over the text parts of a PPM file
 */
class Scanner {
	pos: number

	constructor(
		private readonly data: Uint8Array,
		start: number
	) {
		this.pos = start
	}

	skipWhitespaceAndComments(): void {
		while (this.pos < this.data.length) {
			const byte = this.data[this.pos]
			if (byte === HASH) {
				while (this.pos < this.data.length && this.data[this.pos] !== LF) this.pos++
			} else if (isWhitespace(byte)) {
				this.pos++
			} else {
				break
			}
		}
	}

	readNumber(what: string): number {
		this.skipWhitespaceAndComments()
		let value = 0
		let digits = 0
		while (this.pos < this.data.length && isDigit(this.data[this.pos])) {
			value = value * 10 + (this.data[this.pos] - 0x30)
			this.pos++
			digits++
		}
		if (digits === 0) {
			throw new CodecError('format', `Invalid PPM: expected ${what}`)
		}
		return value
	}
}

/**
 * Parse PPM header
 */
function parseHeader(data: Uint8Array): { header: PpmHeader; scanner: Scanner } {
	if (data.length < 2 || data[0] !== 0x50 || (data[1] !== 0x33 && data[1] !== 0x36)) {
		throw new CodecError('format', 'Invalid PPM: missing magic number')
	}

	const format = data[1] === 0x33 ? PpmFormat.ASCII : PpmFormat.BINARY
	const scanner = new Scanner(data, 2)

	const width = scanner.readNumber('width')
	const height = scanner.readNumber('height')
	const maxVal = scanner.readNumber('maxval')

	if (width === 0 || height === 0) {
		throw new CodecError('format', `Invalid PPM dimensions: ${width}x${height}`)
	}
	if (maxVal === 0 || maxVal > MAX_MAXVAL) {
		throw new CodecError('format', `Invalid PPM maxval: ${maxVal}`)
	}

	// Binary data starts after exactly one whitespace byte
	if (!isAsciiFormat(format)) {
		if (scanner.pos >= data.length || !isWhitespace(data[scanner.pos])) {
			throw new CodecError('format', 'Invalid PPM: missing whitespace before pixel data')
		}
		scanner.pos++
	}

	return { header: { format, width, height, maxVal }, scanner }
}

function scale(value: number, maxVal: number): number {
	return maxVal === 255 ? value : Math.round((value / maxVal) * 255)
}

/**
 * Decode ASCII (P3) samples
 */
function decodeAscii(scanner: Scanner, header: PpmHeader, output: Uint8Array): void {
	for (let i = 0; i < output.length; i++) {
		const value = scanner.readNumber('sample')
		if (value > header.maxVal) {
			throw new CodecError('format', `PPM sample ${value} exceeds maxval ${header.maxVal}`)
		}
		output[i] = scale(value, header.maxVal)
	}
}

/**
 * Decode binary (P6) samples, big-endian when two bytes wide
 */
function decodeBinary(data: Uint8Array, offset: number, header: PpmHeader, output: Uint8Array): void {
	const sampleBytes = bytesPerSample(header.maxVal)

	let srcIdx = offset
	for (let i = 0; i < output.length; i++) {
		let value: number
		if (sampleBytes === 2) {
			value = (data[srcIdx] << 8) | data[srcIdx + 1]
			srcIdx += 2
		} else {
			value = data[srcIdx++]
		}
		output[i] = scale(Math.min(value, header.maxVal), header.maxVal)
	}
}

function parsePpm(data: Uint8Array): ImageData {
	const { header, scanner } = parseHeader(data)
	const samples = header.width * header.height * 3

	// Size check precedes allocation
	const remaining = data.length - scanner.pos
	if (isAsciiFormat(header.format)) {
		if (remaining < samples) {
			throw new CodecError('format', 'Truncated PPM pixel data')
		}
	} else {
		const required = samples * bytesPerSample(header.maxVal)
		if (remaining < required) {
			throw new CodecError('format', `Truncated PPM pixel data: ${remaining} of ${required} bytes`)
		}
	}

	const image = createImageData(header.width, header.height)
	if (isAsciiFormat(header.format)) {
		decodeAscii(scanner, header, image.data)
	} else {
		decodeBinary(data, scanner.pos, header, image.data)
	}

	return image
}

/**
 * Decode PPM (P3/P6) to ImageData
 */
export function decodePpm(data: Uint8Array): DecodeResult {
	return tryDecode(() => parsePpm(data))
}
