/**
 * CSS colour resolution: hex, named colours and hsl()
 */

import type { Color } from '@svgdraw/core'
import { hslToRgb } from './convert'
import namedColors from './named-colors.json'

const NAMED_COLORS: ReadonlyMap<string, string> = new Map(Object.entries(namedColors))

const HEX_COLOR = /^#(?:[0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/
const HSL_COLOR = /^hsla?\(\s*(-?[\d.]+)(?:deg)?\s*,\s*([\d.]+)%\s*,\s*([\d.]+)%\s*(?:,\s*([\d.]+)(%?)\s*)?\)$/

/** Names the resolver knows, lowercase */
export function namedColorNames(): string[] {
	return [...NAMED_COLORS.keys()]
}

/**
 * Resolve a CSS colour string, or null when it is not one.
 * Hex digits are read in CSS order (#rrggbbaa).
 */
export function resolveCssColor(value: string): Color | null {
	let color = value.trim().toLowerCase()

	const named = NAMED_COLORS.get(color)
	if (named) color = named

	if (HEX_COLOR.test(color)) {
		return parseHex(color.slice(1))
	}

	const hslMatch = HSL_COLOR.exec(color)
	if (hslMatch) {
		const h = Number.parseFloat(hslMatch[1] ?? '')
		const s = Number.parseFloat(hslMatch[2] ?? '')
		const l = Number.parseFloat(hslMatch[3] ?? '')
		if (!Number.isFinite(h) || !Number.isFinite(s) || !Number.isFinite(l)) return null

		let alpha = 1
		if (hslMatch[4] !== undefined) {
			alpha = Number.parseFloat(hslMatch[4]) / (hslMatch[5] === '%' ? 100 : 1)
			if (!Number.isFinite(alpha)) return null
		}

		const rgb = hslToRgb(h, s, l)
		return { ...rgb, a: Math.round(Math.min(1, Math.max(0, alpha)) * 255) }
	}

	return null
}

function parseHex(hex: string): Color {
	const digit = (i: number): number => Number.parseInt(hex.charAt(i) + hex.charAt(i), 16)
	const pair = (i: number): number => Number.parseInt(hex.slice(i, i + 2), 16)

	switch (hex.length) {
		case 3:
			return { r: digit(0), g: digit(1), b: digit(2), a: 255 }
		case 4:
			return { r: digit(0), g: digit(1), b: digit(2), a: digit(3) }
		case 6:
			return { r: pair(0), g: pair(2), b: pair(4), a: 255 }
		default:
			return { r: pair(0), g: pair(2), b: pair(4), a: pair(6) }
	}
}
