import { describe, expect, test } from 'vitest'
import {
	CodecError,
	WHITE,
	createImageData,
	detectFormat,
	formatFromPath,
	getPixel,
	getRow,
	isValidImage,
	setPixel,
	tryDecode,
} from './index'

describe('core', () => {
	describe('ImageData', () => {
		test('createImageData fills every pixel', () => {
			const image = createImageData(2, 3, { r: 10, g: 20, b: 30 })

			expect(image.data.length).toBe(18)
			expect(getPixel(image, 1, 2)).toEqual({ r: 10, g: 20, b: 30 })
		})

		test('defaults to black', () => {
			const image = createImageData(4, 1)
			expect(Array.from(image.data)).toEqual(new Array(12).fill(0))
		})

		test('getRow is a live view of one row', () => {
			const image = createImageData(2, 2)
			const row = getRow(image, 1)
			row[3] = 200

			expect(row.length).toBe(6)
			expect(getPixel(image, 1, 1)).toEqual({ r: 200, g: 0, b: 0 })
		})

		test('setPixel writes RGB at (x, y)', () => {
			const image = createImageData(3, 2)
			setPixel(image, 2, 1, WHITE)

			expect(Array.from(image.data.subarray(15, 18))).toEqual([255, 255, 255])
		})

		test('isValidImage rejects empty and mismatched grids', () => {
			expect(isValidImage(createImageData(1, 1))).toBe(true)
			expect(isValidImage({ width: 0, height: 0, data: new Uint8Array(0) })).toBe(false)
			expect(isValidImage({ width: 2, height: 2, data: new Uint8Array(11) })).toBe(false)
			expect(isValidImage({ width: 1.5, height: 2, data: new Uint8Array(9) })).toBe(false)
		})
	})

	describe('tryDecode', () => {
		test('wraps a decoded image', () => {
			const image = createImageData(1, 1)
			expect(tryDecode(() => image)).toEqual({ ok: true, image })
		})

		test('folds CodecError into a failure', () => {
			const result = tryDecode(() => {
				throw new CodecError('format', 'bad header')
			})

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.kind).toBe('format')
				expect(result.error.message).toBe('bad header')
			}
		})

		test('rethrows other errors', () => {
			expect(() =>
				tryDecode(() => {
					throw new RangeError('bug')
				})
			).toThrow(RangeError)
		})
	})

	describe('format detection', () => {
		test('detects by magic bytes', () => {
			expect(detectFormat(new Uint8Array([0x42, 0x4d, 0, 0]))).toBe('bmp')
			expect(detectFormat(new Uint8Array([0x50, 0x36, 0x0a]))).toBe('ppm')
			expect(detectFormat(new Uint8Array([0x50, 0x33, 0x0a]))).toBe('ppm')
			expect(detectFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg')
			expect(detectFormat(new Uint8Array([0x89, 0x50]))).toBeNull()
			expect(detectFormat(new Uint8Array([0x42]))).toBeNull()
		})

		test('maps extensions case-insensitively', () => {
			expect(formatFromPath('photo.JPG')).toBe('jpeg')
			expect(formatFromPath('dir/photo.jpeg')).toBe('jpeg')
			expect(formatFromPath('/tmp/a.b/out.bmp')).toBe('bmp')
			expect(formatFromPath('C:\\images\\in.ppm')).toBe('ppm')
		})

		test('returns null for unknown or missing extensions', () => {
			expect(formatFromPath('image.png')).toBeNull()
			expect(formatFromPath('noext')).toBeNull()
			expect(formatFromPath('/tmp/.bmp')).toBeNull()
			expect(formatFromPath('dir.bmp/file')).toBeNull()
		})
	})
})
