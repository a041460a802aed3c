/**
 * Opacity compositing on colours and brushes
 */

import type { Brush, Color, GradientStop } from '@svgdraw/core'

/** Scale alpha by opacity (clamped to 0-1); opacity >= 1 returns the colour unchanged */
export function applyOpacityToColor(color: Color, opacity: number): Color {
	if (!(opacity < 1)) return color
	const factor = Math.max(0, opacity)
	return { ...color, a: Math.round(color.a * factor) }
}

/** Returns a new brush; gradients get every stop scaled */
export function applyOpacityToBrush<B extends Brush>(brush: B, opacity: number): B
export function applyOpacityToBrush(brush: Brush, opacity: number): Brush {
	if (!(opacity < 1)) return brush

	switch (brush.type) {
		case 'solid':
			return { ...brush, color: applyOpacityToColor(brush.color, opacity) }
		case 'linear':
		case 'radial':
			return { ...brush, stops: brush.stops.map((stop) => applyOpacityToStop(stop, opacity)) }
	}
}

function applyOpacityToStop(stop: GradientStop, opacity: number): GradientStop {
	return { ...stop, color: applyOpacityToColor(stop.color, opacity) }
}

/** Opacity a solid colour carries in its alpha channel */
export function colorOpacity(color: Color): number {
	return color.a / 255
}

/** RGB equality; alpha is ignored */
export function sameRgb(a: Color, b: Color): boolean {
	return a.r === b.r && a.g === b.g && a.b === b.b
}

/** A brush every stop of which is fully transparent */
export function isTransparentBrush(brush: Brush): boolean {
	if (brush.type === 'solid') return brush.color.a === 0
	return brush.stops.length > 0 && brush.stops.every((stop) => stop.color.a === 0)
}
