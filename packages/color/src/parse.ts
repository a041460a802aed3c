/**
 * Paint value parsing: `none`, `rgb(...)` and CSS colours
 */

import { FormatError } from '@svgdraw/core'
import type { Color, SolidBrush } from '@svgdraw/core'
import { resolveCssColor } from './css'

export const BLACK: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 255 })
export const TRANSPARENT: Color = Object.freeze({ r: 255, g: 255, b: 255, a: 0 })

export function solidBrush(color: Color): SolidBrush {
	return { type: 'solid', color }
}

/**
 * Parse a paint value into a colour.
 *
 * - anything starting with `none` is transparent
 * - anything starting with `rgb` takes exactly three integer bytes from between
 *   the parentheses; a component outside 0-255 reads as 0, any other count is black
 * - everything else goes to the CSS resolver
 *
 * @throws FormatError when no rule understands the value
 */
export function parseColor(value: string): Color {
	const trimmed = value.trim()
	const lower = trimmed.toLowerCase()

	if (lower.startsWith('none')) return TRANSPARENT
	if (lower.startsWith('rgb')) return parseRgbFunction(trimmed)

	const color = resolveCssColor(trimmed)
	if (!color) throw new FormatError(`Unrecognized color: '${value}'`)
	return color
}

/** Same rules as {@link parseColor}, wrapped in a solid brush */
export function parseBrush(value: string): SolidBrush {
	return solidBrush(parseColor(value))
}

/** Non-throwing variant for the cascade */
export function tryParseColor(value: string): Color | undefined {
	try {
		return parseColor(value)
	} catch (err) {
		if (err instanceof FormatError) return undefined
		throw err
	}
}

function parseRgbFunction(value: string): Color {
	const open = value.indexOf('(')
	const close = value.indexOf(')', open + 1)
	if (open < 0 || close < 0) return BLACK

	const parts = value.slice(open + 1, close).split(',')
	if (parts.length !== 3) return BLACK

	const [r, g, b] = parts.map(parseByte)
	return { r: r ?? 0, g: g ?? 0, b: b ?? 0, a: 255 }
}

function parseByte(part: string): number {
	const text = part.trim()
	if (!/^\+?\d+$/.test(text)) return 0
	const n = Number.parseInt(text, 10)
	return n <= 255 ? n : 0
}
