/**
 * BMP header model: BITMAPFILEHEADER + BITMAPINFOHEADER, byte-exact and
 * little-endian. Only 24-bit uncompressed bottom-up bitmaps are written or
 * accepted; validation lives in the decoder, not here.
 */

export const BMP_SIGNATURE = 0x4d42 // "BM" read as little-endian uint16
export const FILE_HEADER_SIZE = 14
export const INFO_HEADER_SIZE = 40
export const PIXEL_DATA_OFFSET = FILE_HEADER_SIZE + INFO_HEADER_SIZE

export const BMP_PLANES = 1
export const BMP_BITS_PER_PIXEL = 24
export const BI_RGB = 0

/**
 * 11811 pixels per meter is roughly 300 DPI
 */
export const DEFAULT_RESOLUTION = 11811

/**
 * 2^24, the number of 24-bit colors. Ignored by readers for true-color data.
 */
export const DEFAULT_IMPORTANT_COLORS = 0x1000000

/**
 * Bytes per pixel on disk (B, G, R)
 */
export const BYTES_PER_PIXEL = 3

export interface BmpFileHeader {
	signature: number // u16
	fileSize: number // u32
	reserved: number // u32
	pixelDataOffset: number // u32
}

export interface BmpInfoHeader {
	headerSize: number // u32
	width: number // i32
	height: number // i32, positive = rows stored bottom to top
	colorPlanes: number // u16
	bitsPerPixel: number // u16
	compression: number // u32
	imageDataSize: number // u32
	horizontalResolution: number // i32, pixels per meter
	verticalResolution: number // i32, pixels per meter
	usedColors: number // u32
	importantColors: number // u32
}

export function createFileHeader(fields: Partial<BmpFileHeader> = {}): BmpFileHeader {
	return {
		signature: BMP_SIGNATURE,
		fileSize: 0,
		reserved: 0,
		pixelDataOffset: PIXEL_DATA_OFFSET,
		...fields,
	}
}

export function createInfoHeader(fields: Partial<BmpInfoHeader> = {}): BmpInfoHeader {
	return {
		headerSize: INFO_HEADER_SIZE,
		width: 0,
		height: 0,
		colorPlanes: BMP_PLANES,
		bitsPerPixel: BMP_BITS_PER_PIXEL,
		compression: BI_RGB,
		imageDataSize: 0,
		horizontalResolution: DEFAULT_RESOLUTION,
		verticalResolution: DEFAULT_RESOLUTION,
		usedColors: 0,
		importantColors: DEFAULT_IMPORTANT_COLORS,
		...fields,
	}
}

function viewOf(bytes: Uint8Array, offset: number, length: number): DataView {
	return new DataView(bytes.buffer, bytes.byteOffset + offset, length)
}

export function writeFileHeader(target: Uint8Array, offset: number, header: BmpFileHeader): void {
	const view = viewOf(target, offset, FILE_HEADER_SIZE)
	view.setUint16(0, header.signature, true)
	view.setUint32(2, header.fileSize, true)
	view.setUint32(6, header.reserved, true)
	view.setUint32(10, header.pixelDataOffset, true)
}

export function writeInfoHeader(target: Uint8Array, offset: number, header: BmpInfoHeader): void {
	const view = viewOf(target, offset, INFO_HEADER_SIZE)
	view.setUint32(0, header.headerSize, true)
	view.setInt32(4, header.width, true)
	view.setInt32(8, header.height, true)
	view.setUint16(12, header.colorPlanes, true)
	view.setUint16(14, header.bitsPerPixel, true)
	view.setUint32(16, header.compression, true)
	view.setUint32(20, header.imageDataSize, true)
	view.setInt32(24, header.horizontalResolution, true)
	view.setInt32(28, header.verticalResolution, true)
	view.setUint32(32, header.usedColors, true)
	view.setUint32(36, header.importantColors, true)
}

/**
 * Caller guarantees FILE_HEADER_SIZE bytes are available at offset
 */
export function readFileHeader(source: Uint8Array, offset: number): BmpFileHeader {
	const view = viewOf(source, offset, FILE_HEADER_SIZE)
	return {
		signature: view.getUint16(0, true),
		fileSize: view.getUint32(2, true),
		reserved: view.getUint32(6, true),
		pixelDataOffset: view.getUint32(10, true),
	}
}

/**
 * Caller guarantees INFO_HEADER_SIZE bytes are available at offset
 */
export function readInfoHeader(source: Uint8Array, offset: number): BmpInfoHeader {
	const view = viewOf(source, offset, INFO_HEADER_SIZE)
	return {
		headerSize: view.getUint32(0, true),
		width: view.getInt32(4, true),
		height: view.getInt32(8, true),
		colorPlanes: view.getUint16(12, true),
		bitsPerPixel: view.getUint16(14, true),
		compression: view.getUint32(16, true),
		imageDataSize: view.getUint32(20, true),
		horizontalResolution: view.getInt32(24, true),
		verticalResolution: view.getInt32(28, true),
		usedColors: view.getUint32(32, true),
		importantColors: view.getUint32(36, true),
	}
}

/**
 * Row length in bytes: 3 bytes per pixel, padded up to a multiple of 4
 */
export function bmpStride(width: number): number {
	return 4 * Math.ceil((width * BYTES_PER_PIXEL) / 4)
}
