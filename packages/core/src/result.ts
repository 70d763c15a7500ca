import type { ImageData } from './types'

/**
 * What went wrong: the bytes could not be read or written ('io'), or they
 * were read but do not describe an image we support ('format')
 */
export type CodecErrorKind = 'io' | 'format'

export class CodecError extends Error {
	readonly kind: CodecErrorKind

	constructor(kind: CodecErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'CodecError'
		this.kind = kind
	}
}

/**
 * Outcome of a decode: a valid image, or the reason there is none
 */
export type DecodeResult =
	| { readonly ok: true; readonly image: ImageData }
	| { readonly ok: false; readonly error: CodecError }

/**
 * Outcome of writing an encoded image somewhere
 */
export type SaveResult = { readonly ok: true } | { readonly ok: false; readonly error: CodecError }

export function decoded(image: ImageData): DecodeResult {
	return { ok: true, image }
}

export function failed(error: CodecError): { readonly ok: false; readonly error: CodecError } {
	return { ok: false, error }
}

/**
 * Run a decoder that throws CodecError on bad input and fold the error
 * into a DecodeResult. Anything else is a bug and propagates.
 */
export function tryDecode(decode: () => ImageData): DecodeResult {
	try {
		return decoded(decode())
	} catch (err) {
		if (err instanceof CodecError) return failed(err)
		throw err
	}
}

/**
 * Render any thrown value as a message
 */
export function getErrorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
