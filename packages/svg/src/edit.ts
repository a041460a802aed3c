/**
 * Brush replacement on parsed images
 *
 * Brushes match by solid RGB value. The replacement takes on the opacity of the
 * brush it replaces. Input trees are never modified.
 */

import { applyOpacityToBrush, colorOpacity, sameRgb } from '@svgdraw/color'
import { deepFreeze, mapLeaves } from '@svgdraw/core'
import type { Brush, DrawingImage, GeometryDrawing, GlyphRunDrawing } from '@svgdraw/core'

type Leaf = GeometryDrawing | GlyphRunDrawing

/** A copy of `replacement` adjusted to stand in for `current`, or undefined if `current` does not match */
function swap(current: Brush, existing: Brush, replacement: Brush): Brush | undefined {
	if (current.type !== 'solid' || existing.type !== 'solid') return undefined
	if (!sameRgb(current.color, existing.color)) return undefined
	return applyOpacityToBrush(structuredClone(replacement), colorOpacity(current.color))
}

function replaceInImage(image: DrawingImage, map: (leaf: Leaf) => Leaf): DrawingImage {
	const drawing = mapLeaves(image.drawing, map)
	return drawing === image.drawing ? image : deepFreeze({ ...image, drawing })
}

/** Replace matching shape fills and text foregrounds */
export function replaceFillBrush(image: DrawingImage, existing: Brush, replacement: Brush): DrawingImage {
	return replaceInImage(image, (leaf) => {
		if (leaf.type === 'text') {
			const foreground = swap(leaf.foreground, existing, replacement)
			return foreground ? { ...leaf, foreground } : leaf
		}
		if (!leaf.fill) return leaf
		const fill = swap(leaf.fill, existing, replacement)
		return fill ? { ...leaf, fill } : leaf
	})
}

/** Replace matching pen brushes; thickness, caps, join and dashes are kept */
export function replaceStrokeBrush(image: DrawingImage, existing: Brush, replacement: Brush): DrawingImage {
	return replaceInImage(image, (leaf) => {
		if (leaf.type === 'text' || !leaf.stroke) return leaf
		const brush = swap(leaf.stroke.brush, existing, replacement)
		return brush ? { ...leaf, stroke: { ...leaf.stroke, brush } } : leaf
	})
}
