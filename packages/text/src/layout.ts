/**
 * Glyph run layout
 */

import type { GlyphRun } from '@svgdraw/core'
import { DEFAULT_FONT_SIZE } from './font'
import type { FontFace, GlyphRunOptions, RunMetrics } from './types'

/** Glyph index for a character code; 0 is .notdef */
export function glyphIndex(face: FontFace, charCode: number): number {
	const offset = charCode - face.firstChar
	if (offset < 0 || offset >= face.advanceWidths.length) return 0
	return offset + 1
}

/** Advance of a glyph in design units */
export function glyphAdvance(face: FontFace, index: number): number {
	if (index === 0) return face.notdefAdvance
	return face.advanceWidths[index - 1] ?? face.notdefAdvance
}

/**
 * Lay out a single line of text on one baseline.
 * No kerning, wrapping or line breaks.
 */
export function layoutGlyphRun(text: string, face: FontFace, options: GlyphRunOptions = {}): GlyphRun {
	const { fontSize = DEFAULT_FONT_SIZE, origin = { x: 0, y: 0 }, pixelsPerDip = 1 } = options
	const scale = fontSize / face.unitsPerEm

	const glyphIndices: number[] = []
	const advanceWidths: number[] = []

	for (const ch of text) {
		const index = glyphIndex(face, ch.codePointAt(0) ?? 0)
		glyphIndices.push(index)
		advanceWidths.push(glyphAdvance(face, index) * scale)
	}

	return {
		text,
		fontFamily: face.family,
		fontWeight: face.weight,
		fontStyle: face.style,
		fontSize,
		pixelsPerDip,
		origin,
		glyphIndices,
		advanceWidths,
	}
}

/**
 * Measure a laid-out run
 */
export function measureGlyphRun(run: GlyphRun, face: FontFace): RunMetrics {
	const scale = run.fontSize / face.unitsPerEm
	return {
		width: run.advanceWidths.reduce((sum, w) => sum + w, 0),
		ascent: face.ascent * scale,
		descent: face.descent * scale,
	}
}
