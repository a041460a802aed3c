/**
 * Error taxonomy
 */

export type SvgDrawErrorCode = 'FORMAT' | 'INVALID_DOCUMENT' | 'EMPTY_INPUT'

export class SvgDrawError extends Error {
	readonly code: SvgDrawErrorCode

	constructor(code: SvgDrawErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'SvgDrawError'
		this.code = code
	}
}

/** Malformed transform grammar, or a colour no resolver understands */
export class FormatError extends SvgDrawError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('FORMAT', message, options)
		this.name = 'FormatError'
	}
}

/** Unreadable XML, or a root element that is not <svg> */
export class InvalidDocumentError extends SvgDrawError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('INVALID_DOCUMENT', message, options)
		this.name = 'InvalidDocumentError'
	}

	static buildMessage(source: string, error: unknown): string {
		return `Failed to read SVG ${source}: ${error instanceof Error ? error.message : 'Unknown error'}`
	}
}

export class EmptyInputError extends SvgDrawError {
	constructor(message = 'Input contains no data') {
		super('EMPTY_INPUT', message)
		this.name = 'EmptyInputError'
	}
}
