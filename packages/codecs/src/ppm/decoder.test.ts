import type { DecodeResult, ImageData } from '@imgconv/core'
import { describe, expect, test } from 'vitest'
import { PpmCodec } from './codec'
import { decodePpm } from './decoder'
import { encodePpm, encodePpmAscii } from './encoder'

const bytes = (text: string) => new TextEncoder().encode(text)

function expectImage(result: DecodeResult): ImageData {
	if (!result.ok) throw result.error
	return result.image
}

function expectFailure(result: DecodeResult): string {
	if (result.ok) throw new Error('expected decode to fail')
	return result.error.message
}

describe('PPM Codec', () => {
	// Helper to create a simple test image
	const createTestImage = (width: number, height: number): ImageData => ({
		width,
		height,
		data: new Uint8Array(width * height * 3).map((_, i) => (i * 17 + 50) % 256),
	})

	describe('encode', () => {
		test('writes a P6 header followed by raw RGB', () => {
			const image = createTestImage(2, 2)
			const encoded = PpmCodec.encode(image)

			const header = 'P6\n2 2\n255\n'
			expect(new TextDecoder().decode(encoded.subarray(0, header.length))).toBe(header)
			expect(encoded.length).toBe(header.length + 12)
			expect(Array.from(encoded.subarray(header.length))).toEqual(Array.from(image.data))
		})

		test('writes P3 with one row per line', () => {
			const image: ImageData = {
				width: 2,
				height: 1,
				data: new Uint8Array([255, 0, 10, 1, 2, 3]),
			}

			expect(new TextDecoder().decode(encodePpmAscii(image))).toBe('P3\n2 1\n255\n255 0 10 1 2 3\n')
		})

		test('rejects an invalid image', () => {
			expect(() => encodePpm({ width: 0, height: 3, data: new Uint8Array(0) })).toThrow(
				'Invalid image: 0x3'
			)
		})
	})

	describe('decode', () => {
		test('preserves pixel data through encode/decode cycle', () => {
			const original = createTestImage(4, 3)
			const decoded = expectImage(PpmCodec.decode(PpmCodec.encode(original)))

			expect(decoded.width).toBe(4)
			expect(decoded.height).toBe(3)
			expect(decoded.data).toEqual(original.data)
		})

		test('reads its own ASCII output', () => {
			const original = createTestImage(3, 2)
			expect(expectImage(decodePpm(encodePpmAscii(original))).data).toEqual(original.data)
		})

		test('skips comments and irregular whitespace', () => {
			const decoded = expectImage(
				decodePpm(bytes('P3 # a comment\n# another\n1\t2\r\n255\n  1 2 3\n# mid\n4 5 6'))
			)

			expect(decoded.width).toBe(1)
			expect(decoded.height).toBe(2)
			expect(Array.from(decoded.data)).toEqual([1, 2, 3, 4, 5, 6])
		})

		test('scales samples to 8 bits', () => {
			const decoded = expectImage(decodePpm(bytes('P3\n1 1\n15\n15 0 5\n')))
			expect(Array.from(decoded.data)).toEqual([255, 0, 85])
		})

		test('reads 16-bit big-endian binary samples', () => {
			const header = bytes('P6\n1 1\n65535\n')
			const data = new Uint8Array(header.length + 6)
			data.set(header)
			data.set([0xff, 0xff, 0x00, 0x00, 0x80, 0x00], header.length)

			const decoded = expectImage(decodePpm(data))
			// 0x8000 / 65535 * 255 = 127.50...
			expect(Array.from(decoded.data)).toEqual([255, 0, 128])
		})

		test('keeps binary bytes that look like whitespace', () => {
			const header = bytes('P6\n1 1\n255\n')
			const data = new Uint8Array(header.length + 3)
			data.set(header)
			data.set([0x0a, 0x20, 0x23], header.length)

			expect(Array.from(expectImage(decodePpm(data)).data)).toEqual([0x0a, 0x20, 0x23])
		})
	})

	describe('rejects', () => {
		test('unknown magic', () => {
			expect(expectFailure(decodePpm(bytes('P5\n1 1\n255\n\0')))).toBe(
				'Invalid PPM: missing magic number'
			)
			expect(expectFailure(decodePpm(new Uint8Array(0)))).toBe('Invalid PPM: missing magic number')
		})

		test('missing header fields', () => {
			expect(expectFailure(decodePpm(bytes('P6\n4')))).toBe('Invalid PPM: expected height')
			expect(expectFailure(decodePpm(bytes('P6\n4 4\nx')))).toBe('Invalid PPM: expected maxval')
		})

		test('zero dimensions', () => {
			expect(expectFailure(decodePpm(bytes('P6\n0 4\n255\n')))).toBe('Invalid PPM dimensions: 0x4')
		})

		test('out of range maxval', () => {
			expect(expectFailure(decodePpm(bytes('P3\n1 1\n0\n0 0 0')))).toBe('Invalid PPM maxval: 0')
			expect(expectFailure(decodePpm(bytes('P3\n1 1\n70000\n0 0 0')))).toBe(
				'Invalid PPM maxval: 70000'
			)
		})

		test('ASCII samples above maxval', () => {
			expect(expectFailure(decodePpm(bytes('P3\n1 1\n100\n1 101 1')))).toBe(
				'PPM sample 101 exceeds maxval 100'
			)
		})

		test('truncated binary data', () => {
			expect(expectFailure(decodePpm(bytes('P6\n2 1\n255\nabcde')))).toBe(
				'Truncated PPM pixel data: 5 of 6 bytes'
			)
		})

		test('truncated ASCII data', () => {
			expect(expectFailure(decodePpm(bytes('P3\n2 1\n255\n1 2')))).toBe(
				'Truncated PPM pixel data'
			)
			expect(expectFailure(decodePpm(bytes('P3\n1 1\n255\n1 2        ')))).toBe(
				'Invalid PPM: expected sample'
			)
		})
	})
})
