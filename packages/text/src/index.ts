/**
 * @svgdraw/text - Font faces and glyph run layout
 */

export type { FontFace, GlyphRunOptions, RunMetrics } from './types'
export {
	DEFAULT_FONT_FAMILY,
	DEFAULT_FONT_SIZE,
	getBuiltinFaces,
	matchFontFace,
	parseFontFamilyList,
	parseFontSize,
	parseFontStyle,
	parseFontWeight,
} from './font'
export { glyphAdvance, glyphIndex, layoutGlyphRun, measureGlyphRun } from './layout'
