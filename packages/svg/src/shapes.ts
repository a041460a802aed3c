/**
 * Shape converters: one per basic SVG shape element
 */

import type { Geometry, GeometryDrawing, PathFigure, Point } from '@svgdraw/core'
import type { ElementContext, ResolvedPaint } from './cascade'
import { resolvePaint } from './cascade'
import { warn } from './options'
import { parsePathData } from './path-data'
import { parseLength, parsePoints } from './values'
import { attr } from './xml'

export type ShapeConverter = (ctx: ElementContext) => GeometryDrawing

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** A length attribute; missing or unparsable values fall back */
function length(ctx: ElementContext, name: string, fallback = 0): number {
	const raw = attr(ctx.element, name)
	if (raw === undefined) return fallback
	const value = parseLength(raw)
	if (value === undefined) {
		warn(ctx.options, `Ignoring invalid ${name}='${raw}' on <${ctx.element.localName}>`)
		return fallback
	}
	return value
}

function drawing(geometry: Geometry, paint: ResolvedPaint): GeometryDrawing {
	return {
		type: 'shape',
		geometry: paint.transform ? { ...geometry, transform: paint.transform } : geometry,
		...(paint.fill && { fill: paint.fill }),
		...(paint.stroke && { stroke: paint.stroke }),
	}
}

function samePoint(a: Point, b: Point): boolean {
	return a.x === b.x && a.y === b.y
}

function pointFigure(points: readonly Point[], closed: boolean): PathFigure[] {
	const [start, ...rest] = points
	if (!start) return []

	const last = points[points.length - 1]
	const to = closed && last && !samePoint(last, start) ? [...rest, start] : rest
	return [{ start, segments: to.length > 0 ? [{ type: 'polyline', points: to }] : [], closed }]
}

// ─────────────────────────────────────────────────────────────────────────────
// Converters
// ─────────────────────────────────────────────────────────────────────────────

export const convertRect: ShapeConverter = (ctx) =>
	drawing(
		{
			type: 'rect',
			x: length(ctx, 'x'),
			y: length(ctx, 'y'),
			width: Math.max(0, length(ctx, 'width')),
			height: Math.max(0, length(ctx, 'height')),
			radiusX: length(ctx, 'rx'),
			radiusY: length(ctx, 'ry'),
		},
		resolvePaint(ctx)
	)

export const convertCircle: ShapeConverter = (ctx) => {
	const r = length(ctx, 'r')
	return drawing(
		{ type: 'ellipse', center: { x: length(ctx, 'cx'), y: length(ctx, 'cy') }, radiusX: r, radiusY: r },
		resolvePaint(ctx)
	)
}

export const convertEllipse: ShapeConverter = (ctx) =>
	drawing(
		{
			type: 'ellipse',
			center: { x: length(ctx, 'cx'), y: length(ctx, 'cy') },
			radiusX: length(ctx, 'rx'),
			radiusY: length(ctx, 'ry'),
		},
		resolvePaint(ctx)
	)

/** Lines are stroke-only */
export const convertLine: ShapeConverter = (ctx) =>
	drawing(
		{
			type: 'line',
			start: { x: length(ctx, 'x1'), y: length(ctx, 'y1') },
			end: { x: length(ctx, 'x2'), y: length(ctx, 'y2') },
		},
		resolvePaint(ctx, { fill: false })
	)

function pointShape(closed: boolean): ShapeConverter {
	return (ctx) => {
		const paint = resolvePaint(ctx)
		const points = parsePoints(attr(ctx.element, 'points') ?? '')
		return drawing({ type: 'path', figures: pointFigure(points, closed), fillRule: paint.fillRule }, paint)
	}
}

export const convertPolyline: ShapeConverter = pointShape(false)

/** Closed: the first point is repeated at the end when the last one differs */
export const convertPolygon: ShapeConverter = pointShape(true)

export const convertPath: ShapeConverter = (ctx) => {
	const paint = resolvePaint(ctx)
	const { figures, error } = parsePathData(attr(ctx.element, 'd') ?? '')
	if (error) warn(ctx.options, `Path data truncated: ${error}`)
	return drawing({ type: 'path', figures, fillRule: paint.fillRule }, paint)
}

const SHAPE_CONVERTERS: ReadonlyMap<string, ShapeConverter> = new Map([
	['rect', convertRect],
	['circle', convertCircle],
	['ellipse', convertEllipse],
	['line', convertLine],
	['polyline', convertPolyline],
	['polygon', convertPolygon],
	['path', convertPath],
])

export function isShapeElement(localName: string): boolean {
	return SHAPE_CONVERTERS.has(localName)
}

/** Convert a shape element, or undefined if it is not one */
export function convertShape(ctx: ElementContext): GeometryDrawing | undefined {
	return SHAPE_CONVERTERS.get(ctx.element.localName)?.(ctx)
}
