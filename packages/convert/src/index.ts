/**
 * imgconv - convert raster images between BMP, PPM and JPEG
 */

// Re-export core types and utilities
export * from '@imgconv/core'

// Re-export codecs
export * from '@imgconv/codecs'

// Main API
export { convert, convertFile, type ConvertOptions, type ConvertOutcome } from './convert'
export {
	codecForPath,
	getCodec,
	loadImage,
	loadImageFromPath,
	saveImage,
	saveImageToPath,
} from './image'
