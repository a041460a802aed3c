/**
 * <text> converter: a single glyph run on one baseline
 */

import type { DrawingNode, GlyphRunDrawing } from '@svgdraw/core'
import { DEFAULT_FONT_FAMILY, DEFAULT_FONT_SIZE, layoutGlyphRun, matchFontFace } from '@svgdraw/text'
import { isIdentity } from '@svgdraw/transform'
import type { ElementContext } from './cascade'
import { resolveFill } from './cascade'
import { pick, readElementStyle } from './style'
import { scanNumbers } from './values'
import { attr } from './xml'

/** First coordinate of an `x`/`y` list */
function coordinate(ctx: ElementContext, name: string): number {
	return scanNumbers(attr(ctx.element, name) ?? '')[0] ?? 0
}

/**
 * Convert a text element. Whitespace collapses to single spaces;
 * an element with no text yields nothing.
 */
export function convertText(ctx: ElementContext): DrawingNode | undefined {
	const content = ctx.element.text.replace(/\s+/g, ' ').trim()
	if (content === '') return undefined

	const source = readElementStyle(ctx.element, ctx)
	const face = matchFontFace(
		pick(source, 'fontFamily') ?? DEFAULT_FONT_FAMILY,
		pick(source, 'fontWeight') ?? 'normal',
		pick(source, 'fontStyle') ?? 'normal',
		ctx.options.fonts
	)

	const text: GlyphRunDrawing = {
		type: 'text',
		run: layoutGlyphRun(content, face, {
			fontSize: pick(source, 'fontSize') ?? DEFAULT_FONT_SIZE,
			origin: { x: coordinate(ctx, 'x'), y: coordinate(ctx, 'y') },
			pixelsPerDip: ctx.options.pixelsPerDip,
		}),
		foreground: resolveFill(ctx, source),
	}

	const transform = pick(source, 'transform')
	return transform && !isIdentity(transform) ? { type: 'group', children: [text], transform } : text
}
