/**
 * linearGradient / radialGradient converters
 */

import { applyOpacityToColor, BLACK } from '@svgdraw/color'
import type {
	BrushMappingMode,
	GradientBrush,
	GradientStop,
	LinearGradientBrush,
	Point,
	RadialGradientBrush,
	SpreadMethod,
	Transform,
} from '@svgdraw/core'
import { IDENTITY, parseTransform } from '@svgdraw/transform'
import type { ElementContext } from './cascade'
import { warn } from './options'
import type { StyleContext } from './style'
import { pick, readElementStyle } from './style'
import { parseFraction, parseHref } from './values'
import { attr } from './xml'
import type { XmlElement } from './xml'

/** Structural defaults; a field still holding one is filled in from the `href` target */
export const LINEAR_DEFAULTS = Object.freeze({ start: { x: 0, y: 0 }, end: { x: 1, y: 1 } })
export const RADIAL_DEFAULTS = Object.freeze({ center: { x: 0.5, y: 0.5 }, origin: { x: 0.5, y: 0.5 }, radius: 0.5 })

export function isGradientElement(localName: string): boolean {
	return localName === 'linearGradient' || localName === 'radialGradient'
}

// ─────────────────────────────────────────────────────────────────────────────
// Attributes
// ─────────────────────────────────────────────────────────────────────────────

function fraction(ctx: StyleContext, element: XmlElement, name: string, fallback: number): number {
	const raw = attr(element, name)
	if (raw === undefined) return fallback
	const value = parseFraction(raw)
	if (value === undefined) {
		warn(ctx.options, `Ignoring invalid ${name}='${raw}' on <${element.localName}>`)
		return fallback
	}
	return value
}

function mappingMode(element: XmlElement): BrushMappingMode | undefined {
	const value = attr(element, 'gradientUnits')
	if (value === undefined) return undefined
	return value.trim() === 'userSpaceOnUse' ? 'absolute' : 'relativeToBoundingBox'
}

function spreadMethod(element: XmlElement): SpreadMethod | undefined {
	const value = attr(element, 'spreadMethod')?.trim().toLowerCase()
	if (value === undefined) return undefined
	return value === 'reflect' ? 'reflect' : value === 'repeat' ? 'repeat' : 'pad'
}

function gradientTransform(element: XmlElement): Transform | undefined {
	const value = attr(element, 'gradientTransform')
	return value === undefined ? undefined : parseTransform(value)
}

/** The gradient an `href` or `xlink:href` points at, if already registered */
function referencedGradient(ctx: ElementContext): GradientBrush | undefined {
	const href = attr(ctx.element, 'href') ?? attr(ctx.element, 'xlink:href')
	if (href === undefined) return undefined

	const id = parseHref(href)
	const brush = ctx.registry.get(id, 'brush')
	if (!brush || brush.type === 'solid') {
		warn(ctx.options, `Gradient reference '#${id}' not found`)
		return undefined
	}
	return brush
}

// ─────────────────────────────────────────────────────────────────────────────
// Stops
// ─────────────────────────────────────────────────────────────────────────────

/** Offset, colour and opacity of one `<stop>`; `style` wins over attributes */
export function parseStop(element: XmlElement, ctx: StyleContext): GradientStop {
	const source = readElementStyle(element, ctx)
	const offset = fraction(ctx, element, 'offset', 0)
	const color = pick(source, 'stopColor') ?? BLACK
	const opacity = pick(source, 'stopOpacity') ?? 1

	return {
		offset: Math.min(1, Math.max(0, offset)),
		color: applyOpacityToColor(color, opacity),
	}
}

function parseStops(ctx: ElementContext): GradientStop[] {
	return ctx.element.children.filter((child) => child.localName === 'stop').map((stop) => parseStop(stop, ctx))
}

function samePoint(a: Point, b: Point): boolean {
	return a.x === b.x && a.y === b.y
}

// ─────────────────────────────────────────────────────────────────────────────
// Converters
// ─────────────────────────────────────────────────────────────────────────────

export function convertLinearGradient(ctx: ElementContext): LinearGradientBrush {
	const { element } = ctx
	const parent = referencedGradient(ctx)
	const base = parent?.type === 'linear' ? parent : undefined

	const start = {
		x: fraction(ctx, element, 'x1', LINEAR_DEFAULTS.start.x),
		y: fraction(ctx, element, 'y1', LINEAR_DEFAULTS.start.y),
	}
	const end = {
		x: fraction(ctx, element, 'x2', LINEAR_DEFAULTS.end.x),
		y: fraction(ctx, element, 'y2', LINEAR_DEFAULTS.end.y),
	}
	const stops = parseStops(ctx)

	return {
		type: 'linear',
		start: base && samePoint(start, LINEAR_DEFAULTS.start) ? base.start : start,
		end: base && samePoint(end, LINEAR_DEFAULTS.end) ? base.end : end,
		stops: stops.length === 0 && parent ? parent.stops : stops,
		spread: spreadMethod(element) ?? parent?.spread ?? 'pad',
		mappingMode: mappingMode(element) ?? parent?.mappingMode ?? 'relativeToBoundingBox',
		transform: gradientTransform(element) ?? parent?.transform ?? IDENTITY,
	}
}

export function convertRadialGradient(ctx: ElementContext): RadialGradientBrush {
	const { element } = ctx
	const parent = referencedGradient(ctx)
	const base = parent?.type === 'radial' ? parent : undefined

	const center = {
		x: fraction(ctx, element, 'cx', RADIAL_DEFAULTS.center.x),
		y: fraction(ctx, element, 'cy', RADIAL_DEFAULTS.center.y),
	}
	const origin = {
		x: fraction(ctx, element, 'fx', RADIAL_DEFAULTS.origin.x),
		y: fraction(ctx, element, 'fy', RADIAL_DEFAULTS.origin.y),
	}
	const radius = fraction(ctx, element, 'r', RADIAL_DEFAULTS.radius)
	const inheritRadius = base !== undefined && radius === RADIAL_DEFAULTS.radius
	const stops = parseStops(ctx)

	return {
		type: 'radial',
		center: base && samePoint(center, RADIAL_DEFAULTS.center) ? base.center : center,
		origin: base && samePoint(origin, RADIAL_DEFAULTS.origin) ? base.origin : origin,
		radiusX: inheritRadius && base ? base.radiusX : radius,
		radiusY: inheritRadius && base ? base.radiusY : radius,
		stops: stops.length === 0 && parent ? parent.stops : stops,
		spread: spreadMethod(element) ?? parent?.spread ?? 'pad',
		mappingMode: mappingMode(element) ?? parent?.mappingMode ?? 'relativeToBoundingBox',
		transform: gradientTransform(element) ?? parent?.transform ?? IDENTITY,
	}
}

/** Convert a gradient element, or undefined if it is not one */
export function convertGradient(ctx: ElementContext): GradientBrush | undefined {
	switch (ctx.element.localName) {
		case 'linearGradient':
			return convertLinearGradient(ctx)
		case 'radialGradient':
			return convertRadialGradient(ctx)
		default:
			return undefined
	}
}
