/**
 * Parse options and diagnostics
 */

import type { FontFace } from '@svgdraw/text'

export interface ParseOptions {
	/** Device pixels per 1/96 inch, stored on glyph runs (default: 1) */
	pixelsPerDip?: number
	/** Faces searched before the built-in Arial faces */
	fonts?: readonly FontFace[]
	/** Report skipped values through console.warn (default: false) */
	verbose?: boolean
}

export interface ResolvedParseOptions {
	readonly pixelsPerDip: number
	readonly fonts: readonly FontFace[]
	readonly verbose: boolean
}

export function resolveOptions(options: ParseOptions = {}): ResolvedParseOptions {
	const { pixelsPerDip = 1, fonts = [], verbose = false } = options
	if (!(pixelsPerDip > 0)) {
		throw new RangeError(`pixelsPerDip must be positive, got ${pixelsPerDip}`)
	}
	return { pixelsPerDip, fonts, verbose }
}

export function warn(options: ResolvedParseOptions, message: string, cause?: unknown): void {
	if (!options.verbose) return
	if (cause === undefined) console.warn(`[svgdraw] ${message}`)
	else console.warn(`[svgdraw] ${message}`, cause)
}
