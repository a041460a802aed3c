/**
 * Attribute value helpers
 */

import type { Point } from '@svgdraw/core'

const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const NUMBER_TOKEN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/g

/** A whole-string number, or undefined */
export function parseNumber(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const text = value.trim()
	return NUMBER.test(text) ? Number.parseFloat(text) : undefined
}

/** A number with an optional `px` suffix */
export function parseLength(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	return parseNumber(value.trim().replace(/px$/i, ''))
}

/** A number, or a percentage read as a fraction (`50%` is 0.5) */
export function parseFraction(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const text = value.trim()
	if (text.endsWith('%')) {
		const n = parseNumber(text.slice(0, -1))
		return n === undefined ? undefined : n / 100
	}
	return parseNumber(text)
}

/** Every number in the text, in order; separators are not validated */
export function scanNumbers(value: string): number[] {
	const numbers: number[] = []
	for (const match of value.matchAll(NUMBER_TOKEN)) {
		const n = Number.parseFloat(match[0])
		if (Number.isFinite(n)) numbers.push(n)
	}
	return numbers
}

/** Coordinate pairs; a trailing odd value is dropped */
export function parsePoints(value: string): Point[] {
	const values = scanNumbers(value)
	const points: Point[] = []
	for (let i = 0; i + 1 < values.length; i += 2) {
		points.push({ x: values[i] ?? 0, y: values[i + 1] ?? 0 })
	}
	return points
}

/** The id inside a leading `url(#id)`, or undefined when the value is not a reference. A trailing fallback is ignored. */
export function parseUrlReference(value: string): string | undefined {
	const match = /^\s*url\(\s*['"]?#([^)'"\s]+)['"]?\s*\)/.exec(value)
	return match?.[1]
}

/** The id an `href` points at */
export function parseHref(value: string): string {
	return value.trim().replace(/^#/, '')
}
