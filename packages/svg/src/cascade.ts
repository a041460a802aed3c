/**
 * Cascade resolution: style > presentation attribute > inherited group state
 */

import { applyOpacityToBrush, BLACK, isTransparentBrush, solidBrush } from '@svgdraw/color'
import type { Brush, FillRule, Pen, Transform } from '@svgdraw/core'
import { isIdentity, parseTransform } from '@svgdraw/transform'
import type { ResolvedParseOptions } from './options'
import type { DefinitionsRegistry } from './registry'
import type { ElementStyle, StyleContext } from './style'
import { parsePaint, pick, readElementStyle } from './style'
import { parseLength, parseNumber } from './values'
import { attr } from './xml'
import type { XmlElement } from './xml'

/** Properties a <svg> or <g> passes down to its descendants */
export interface InheritedGroupState {
	readonly stroke?: string
	readonly strokeWidth?: number
	readonly fill?: string
	readonly fillRule?: string
	/** Product of every ancestor group's opacity */
	readonly opacity: number
}

export const ROOT_GROUP_STATE: InheritedGroupState = Object.freeze({ opacity: 1 })

/** Everything a converter needs to turn one element into a drawing node */
export interface ElementContext extends StyleContext {
	readonly element: XmlElement
	readonly inherited: InheritedGroupState
}

export function createElementContext(
	element: XmlElement,
	registry: DefinitionsRegistry,
	inherited: InheritedGroupState,
	options: ResolvedParseOptions
): ElementContext {
	return { element, registry, inherited, options }
}

/**
 * Copy the parent's state and apply this group's own attributes.
 * Opacity multiplies; the rest replace.
 */
export function deriveGroupState(element: XmlElement, parent: InheritedGroupState): InheritedGroupState {
	const stroke = attr(element, 'stroke')
	const strokeWidth = parseLength(attr(element, 'stroke-width'))
	const fill = attr(element, 'fill')
	const fillRule = attr(element, 'fill-rule')
	const opacity = parseNumber(attr(element, 'opacity'))

	return {
		stroke: stroke ?? parent.stroke,
		strokeWidth: strokeWidth ?? parent.strokeWidth,
		fill: fill ?? parent.fill,
		fillRule: fillRule ?? parent.fillRule,
		opacity: opacity === undefined ? parent.opacity : parent.opacity * opacity,
	}
}

/** The `transform` attribute of a group, if it has one */
export function groupTransform(element: XmlElement): Transform | undefined {
	const value = attr(element, 'transform')
	return value === undefined ? undefined : parseTransform(value)
}

// ─────────────────────────────────────────────────────────────────────────────
// Paint
// ─────────────────────────────────────────────────────────────────────────────

export interface ResolvedPaint {
	readonly fill?: Brush
	readonly stroke?: Pen
	readonly transform?: Transform
	readonly fillRule: FillRule
}

export interface PaintOptions {
	/** Lines never get a fill */
	readonly fill: boolean
}

function inheritedBrush(value: string | undefined, ctx: StyleContext): Brush | undefined {
	return value === undefined ? undefined : parsePaint(value, ctx)
}

function withOpacity(brush: Brush, opacity: number): Brush {
	return isTransparentBrush(brush) ? brush : applyOpacityToBrush(brush, opacity)
}

/** Gradients follow the geometry they paint */
function followTransform(brush: Brush, transform: Transform | undefined): Brush {
	if (brush.type === 'solid' || transform === undefined || isIdentity(transform)) return brush
	const children = isIdentity(brush.transform) ? [transform] : [brush.transform, transform]
	return { ...brush, transform: { type: 'group', children } }
}

export function resolveFill(ctx: ElementContext, source: ElementStyle = readElementStyle(ctx.element, ctx)): Brush {
	const base = pick(source, 'fill') ?? inheritedBrush(ctx.inherited.fill, ctx) ?? solidBrush(BLACK)
	const opacity = (pick(source, 'fillOpacity') ?? 1) * (pick(source, 'opacity') ?? 1) * ctx.inherited.opacity
	return withOpacity(base, opacity)
}

export function resolveStroke(ctx: ElementContext, source: ElementStyle = readElementStyle(ctx.element, ctx)): Pen | undefined {
	const brush = pick(source, 'stroke') ?? inheritedBrush(ctx.inherited.stroke, ctx)
	if (!brush) return undefined

	const opacity = (pick(source, 'strokeOpacity') ?? 1) * (pick(source, 'opacity') ?? 1) * ctx.inherited.opacity
	const width = pick(source, 'strokeWidth') ?? ctx.inherited.strokeWidth ?? 1
	const cap = pick(source, 'strokeLinecap') ?? 'flat'

	return {
		brush: withOpacity(brush, opacity),
		thickness: width > 0 ? width : 1,
		startCap: cap,
		endCap: cap,
		lineJoin: pick(source, 'strokeLinejoin') ?? 'miter',
		miterLimit: pick(source, 'strokeMiterlimit') ?? 10,
		dashArray: pick(source, 'strokeDasharray') ?? [],
		dashOffset: pick(source, 'strokeDashoffset') ?? 0,
	}
}

export function resolveFillRule(ctx: ElementContext, source: ElementStyle): FillRule {
	const local = pick(source, 'fillRule')
	if (local) return local
	return ctx.inherited.fillRule?.trim().toLowerCase() === 'evenodd' ? 'evenodd' : 'nonzero'
}

/**
 * Fill, pen, transform and fill rule of a shape element
 */
export function resolvePaint(ctx: ElementContext, options: PaintOptions = { fill: true }): ResolvedPaint {
	const source = readElementStyle(ctx.element, ctx)
	const transform = pick(source, 'transform')
	const fill = options.fill ? resolveFill(ctx, source) : undefined
	const stroke = resolveStroke(ctx, source)

	return {
		fill: fill && followTransform(fill, transform),
		stroke: stroke && { ...stroke, brush: followTransform(stroke.brush, transform) },
		transform,
		fillRule: resolveFillRule(ctx, source),
	}
}
