/**
 * Style declarations and presentation attributes
 *
 * Both the `style` attribute and the presentation attributes are read into the
 * same typed StyleMap through one parser per property.
 */

import { BLACK, solidBrush, tryParseColor } from '@svgdraw/color'
import type { Brush, Color, FillRule, FontStyle, FontWeight, LineCap, LineJoin, Transform } from '@svgdraw/core'
import { parseFontSize, parseFontStyle, parseFontWeight } from '@svgdraw/text'
import { IDENTITY, parseTransform } from '@svgdraw/transform'
import type { ResolvedParseOptions } from './options'
import { warn } from './options'
import type { DefinitionsRegistry } from './registry'
import { parseNumber, parseUrlReference } from './values'
import type { XmlElement } from './xml'

export interface StyleMap {
	readonly fill?: Brush
	readonly fillOpacity?: number
	readonly fillRule?: FillRule
	readonly stroke?: Brush
	readonly strokeWidth?: number
	readonly strokeOpacity?: number
	readonly strokeLinecap?: LineCap
	readonly strokeLinejoin?: LineJoin
	readonly strokeMiterlimit?: number
	readonly strokeDasharray?: readonly number[]
	readonly strokeDashoffset?: number
	readonly opacity?: number
	readonly stopColor?: Color
	readonly stopOpacity?: number
	readonly transform?: Transform
	readonly fontFamily?: string
	readonly fontSize?: number
	readonly fontWeight?: FontWeight
	readonly fontStyle?: FontStyle
}

export type StyleKey = keyof StyleMap

export interface StyleContext {
	readonly registry: DefinitionsRegistry
	readonly options: ResolvedParseOptions
}

type StyleParsers = { readonly [K in StyleKey]: (value: string, ctx: StyleContext) => StyleMap[K] }

type MutableStyleMap = { -readonly [K in StyleKey]?: StyleMap[K] }

const BLACK_BRUSH: Brush = Object.freeze(solidBrush(BLACK))

// ─────────────────────────────────────────────────────────────────────────────
// Value parsers
// ─────────────────────────────────────────────────────────────────────────────

/** A paint value: `url(#id)` or a colour. Unrecognized values are undefined. */
export function parsePaint(value: string, ctx: StyleContext): Brush | undefined {
	const id = parseUrlReference(value)
	if (id !== undefined) return ctx.registry.get(id, 'brush') ?? BLACK_BRUSH

	const color = tryParseColor(value)
	if (!color) {
		warn(ctx.options, `Ignoring unrecognized paint '${value}'`)
		return undefined
	}
	return solidBrush(color)
}

function numberValue(value: string, ctx: StyleContext): number | undefined {
	const id = parseUrlReference(value)
	if (id !== undefined) return ctx.registry.get(id, 'scalar') ?? 0

	const n = parseNumber(value.replace(/px\s*$/i, ''))
	if (n === undefined) warn(ctx.options, `Ignoring invalid number '${value}'`)
	return n
}

function dashArrayValue(value: string, ctx: StyleContext): readonly number[] | undefined {
	const id = parseUrlReference(value)
	if (id !== undefined) return ctx.registry.get(id, 'dashArray') ?? []
	if (value.trim().toLowerCase() === 'none') return []

	return value
		.split(/[\s,]+/)
		.filter((token) => token.length > 0)
		.map((token) => parseNumber(token) ?? 0)
}

function transformValue(value: string, ctx: StyleContext): Transform {
	const id = parseUrlReference(value)
	if (id !== undefined) return ctx.registry.get(id, 'transform') ?? IDENTITY
	return parseTransform(value)
}

function keyword(value: string): string {
	return value.trim().toLowerCase()
}

const STYLE_PARSERS: StyleParsers = {
	fill: parsePaint,
	fillOpacity: numberValue,
	fillRule: (value) => (keyword(value) === 'evenodd' ? 'evenodd' : 'nonzero'),
	stroke: parsePaint,
	strokeWidth: numberValue,
	strokeOpacity: numberValue,
	strokeLinecap: (value) => {
		const v = keyword(value)
		return v === 'round' ? 'round' : v === 'square' ? 'square' : 'flat'
	},
	strokeLinejoin: (value) => {
		const v = keyword(value)
		return v === 'round' ? 'round' : v === 'bevel' ? 'bevel' : 'miter'
	},
	strokeMiterlimit: (value, ctx) => {
		const n = numberValue(value, ctx)
		return n === undefined ? undefined : Math.max(1, n)
	},
	strokeDasharray: dashArrayValue,
	strokeDashoffset: numberValue,
	opacity: numberValue,
	stopColor: (value, ctx) => {
		const color = tryParseColor(value)
		if (!color) warn(ctx.options, `Ignoring unrecognized stop color '${value}'`)
		return color
	},
	stopOpacity: numberValue,
	transform: transformValue,
	fontFamily: (value) => (value.trim() === '' ? undefined : value.trim()),
	fontSize: (value, ctx) => {
		const size = parseFontSize(value)
		if (size === undefined) warn(ctx.options, `Ignoring unsupported font size '${value}'`)
		return size
	},
	fontWeight: (value) => parseFontWeight(value),
	fontStyle: (value) => parseFontStyle(value),
}

/** CSS property name -> StyleMap key */
const PROPERTY_NAMES: ReadonlyMap<string, StyleKey> = new Map<string, StyleKey>([
	['fill', 'fill'],
	['fill-opacity', 'fillOpacity'],
	['fill-rule', 'fillRule'],
	['stroke', 'stroke'],
	['stroke-width', 'strokeWidth'],
	['stroke-opacity', 'strokeOpacity'],
	['stroke-linecap', 'strokeLinecap'],
	['stroke-linejoin', 'strokeLinejoin'],
	['stroke-miterlimit', 'strokeMiterlimit'],
	['stroke-dasharray', 'strokeDasharray'],
	['stroke-dashoffset', 'strokeDashoffset'],
	['opacity', 'opacity'],
	['stop-color', 'stopColor'],
	['stop-opacity', 'stopOpacity'],
	['transform', 'transform'],
	['font-family', 'fontFamily'],
	['font-size', 'fontSize'],
	['font-weight', 'fontWeight'],
	['font-style', 'fontStyle'],
])

function applyProperty<K extends StyleKey>(style: MutableStyleMap, key: K, value: string, ctx: StyleContext): void {
	const parsed = STYLE_PARSERS[key](value, ctx)
	if (parsed !== undefined) style[key] = parsed
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry points
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse `key: value;` declarations.
 * Unknown properties are ignored; a value its parser rejects is skipped.
 *
 * @throws FormatError from a malformed `transform` value
 */
export function parseStyle(text: string, ctx: StyleContext): StyleMap {
	const style: MutableStyleMap = {}

	for (const declaration of text.split(';')) {
		const colon = declaration.indexOf(':')
		if (colon < 0) continue

		const name = declaration.slice(0, colon).replace(/^[\s,]+/, '').trim().toLowerCase()
		const value = declaration.slice(colon + 1).trim()
		const key = PROPERTY_NAMES.get(name)
		if (key === undefined || value === '') continue

		applyProperty(style, key, value, ctx)
	}

	return style
}

/** Presentation attributes (`fill="red"` and the like) as a StyleMap */
export function presentationStyle(element: XmlElement, ctx: StyleContext): StyleMap {
	const style: MutableStyleMap = {}

	for (const [name, value] of element.attributes) {
		const key = PROPERTY_NAMES.get(name)
		if (key === undefined || value.trim() === '') continue
		applyProperty(style, key, value, ctx)
	}

	return style
}

/** The element's `style` declarations, or an empty map */
export function inlineStyle(element: XmlElement, ctx: StyleContext): StyleMap {
	const text = element.attributes.get('style')
	return text === undefined ? {} : parseStyle(text, ctx)
}

/** Style and attribute values of one element, style first */
export interface ElementStyle {
	readonly style: StyleMap
	readonly attributes: StyleMap
}

export function readElementStyle(element: XmlElement, ctx: StyleContext): ElementStyle {
	return { style: inlineStyle(element, ctx), attributes: presentationStyle(element, ctx) }
}

/** A property's value with `style` taking precedence over the attribute */
export function pick<K extends StyleKey>(source: ElementStyle, key: K): StyleMap[K] {
	return source.style[key] ?? source.attributes[key]
}
