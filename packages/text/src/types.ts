/**
 * Font and text layout types
 */

import type { FontStyle, FontWeight, Point } from '@svgdraw/core'

/** Advance-width metrics for one face of a font family */
export interface FontFace {
	/** Family name */
	readonly family: string
	/** Other family names that resolve to this face */
	readonly aliases: readonly string[]
	readonly weight: FontWeight
	readonly style: FontStyle
	/** Design units per em */
	readonly unitsPerEm: number
	readonly ascent: number
	readonly descent: number
	/** Character code of glyph index 1 */
	readonly firstChar: number
	/** Advance widths in design units, one per character from firstChar */
	readonly advanceWidths: readonly number[]
	/** Advance of glyph 0, used for characters the face lacks */
	readonly notdefAdvance: number
}

/** Glyph run layout options */
export interface GlyphRunOptions {
	/** Em size in px (default: 12) */
	fontSize?: number
	/** Baseline origin (default: 0,0) */
	origin?: Point
	/** Device pixels per 1/96 inch (default: 1) */
	pixelsPerDip?: number
}

/** Text measurement result */
export interface RunMetrics {
	/** Total advance in px */
	width: number
	/** Ascent above the baseline in px */
	ascent: number
	/** Descent below the baseline in px */
	descent: number
}
