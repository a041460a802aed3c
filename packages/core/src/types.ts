/**
 * Drawing tree model
 * Every value here is produced once by the parser and then frozen
 */

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

export interface Point {
	readonly x: number
	readonly y: number
}

/** Straight (non-premultiplied) RGBA, each channel 0-255 */
export interface Color {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
}

/**
 * 2D affine matrix in row-vector form:
 * x' = a*x + c*y + e, y' = b*x + d*y + f
 */
export interface Matrix {
	readonly a: number
	readonly b: number
	readonly c: number
	readonly d: number
	readonly e: number
	readonly f: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Transforms
// ─────────────────────────────────────────────────────────────────────────────

/** Angles are in degrees */
export type Transform =
	| { readonly type: 'identity' }
	| { readonly type: 'translate'; readonly x: number; readonly y: number }
	| { readonly type: 'scale'; readonly x: number; readonly y: number }
	| { readonly type: 'rotate'; readonly angle: number }
	| { readonly type: 'skewX'; readonly angle: number }
	| { readonly type: 'skewY'; readonly angle: number }
	| { readonly type: 'matrix'; readonly matrix: Matrix }
	/** Children apply in order: the first one listed acts on the point first */
	| { readonly type: 'group'; readonly children: readonly Transform[] }

export type TransformType = Transform['type']

// ─────────────────────────────────────────────────────────────────────────────
// Brushes
// ─────────────────────────────────────────────────────────────────────────────

export interface GradientStop {
	readonly offset: number // 0-1
	readonly color: Color
}

export type SpreadMethod = 'pad' | 'reflect' | 'repeat'

export type BrushMappingMode = 'absolute' | 'relativeToBoundingBox'

export interface SolidBrush {
	readonly type: 'solid'
	readonly color: Color
}

export interface LinearGradientBrush {
	readonly type: 'linear'
	readonly start: Point
	readonly end: Point
	readonly stops: readonly GradientStop[]
	readonly spread: SpreadMethod
	readonly mappingMode: BrushMappingMode
	readonly transform: Transform
}

export interface RadialGradientBrush {
	readonly type: 'radial'
	readonly center: Point
	/** Focal point */
	readonly origin: Point
	readonly radiusX: number
	readonly radiusY: number
	readonly stops: readonly GradientStop[]
	readonly spread: SpreadMethod
	readonly mappingMode: BrushMappingMode
	readonly transform: Transform
}

export type GradientBrush = LinearGradientBrush | RadialGradientBrush

export type Brush = SolidBrush | GradientBrush

// ─────────────────────────────────────────────────────────────────────────────
// Pens
// ─────────────────────────────────────────────────────────────────────────────

export type LineCap = 'flat' | 'round' | 'square'
export type LineJoin = 'miter' | 'round' | 'bevel'

export interface Pen {
	readonly brush: Brush
	/** Always > 0 */
	readonly thickness: number
	readonly startCap: LineCap
	readonly endCap: LineCap
	readonly lineJoin: LineJoin
	/** Always >= 1 */
	readonly miterLimit: number
	readonly dashArray: readonly number[]
	readonly dashOffset: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Geometry
// ─────────────────────────────────────────────────────────────────────────────

export type FillRule = 'nonzero' | 'evenodd'

export type PathSegment =
	| { readonly type: 'line'; readonly to: Point }
	| { readonly type: 'polyline'; readonly points: readonly Point[] }
	| { readonly type: 'cubic'; readonly control1: Point; readonly control2: Point; readonly to: Point }
	| { readonly type: 'quadratic'; readonly control: Point; readonly to: Point }
	| {
			readonly type: 'arc'
			readonly radiusX: number
			readonly radiusY: number
			/** Degrees */
			readonly rotation: number
			readonly largeArc: boolean
			/** true = clockwise in a y-down space */
			readonly sweep: boolean
			readonly to: Point
	  }

export interface PathFigure {
	readonly start: Point
	readonly segments: readonly PathSegment[]
	readonly closed: boolean
}

export interface PathGeometry {
	readonly type: 'path'
	readonly figures: readonly PathFigure[]
	readonly fillRule: FillRule
	readonly transform?: Transform
}

export interface RectangleGeometry {
	readonly type: 'rect'
	readonly x: number
	readonly y: number
	readonly width: number
	readonly height: number
	readonly radiusX: number
	readonly radiusY: number
	readonly transform?: Transform
}

export interface EllipseGeometry {
	readonly type: 'ellipse'
	readonly center: Point
	readonly radiusX: number
	readonly radiusY: number
	readonly transform?: Transform
}

export interface LineGeometry {
	readonly type: 'line'
	readonly start: Point
	readonly end: Point
	readonly transform?: Transform
}

export type Geometry = PathGeometry | RectangleGeometry | EllipseGeometry | LineGeometry

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

export type FontWeight = 'normal' | 'bold'
export type FontStyle = 'normal' | 'italic' | 'oblique'

/** A single laid-out line of glyphs on one baseline */
export interface GlyphRun {
	readonly text: string
	readonly fontFamily: string
	readonly fontWeight: FontWeight
	readonly fontStyle: FontStyle
	/** Em size in px */
	readonly fontSize: number
	readonly pixelsPerDip: number
	/** Start of the baseline */
	readonly origin: Point
	readonly glyphIndices: readonly number[]
	readonly advanceWidths: readonly number[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Drawing nodes
// ─────────────────────────────────────────────────────────────────────────────

export interface DrawingGroup {
	readonly type: 'group'
	readonly children: readonly DrawingNode[]
	readonly transform?: Transform
}

export interface GeometryDrawing {
	readonly type: 'shape'
	readonly geometry: Geometry
	readonly fill?: Brush
	readonly stroke?: Pen
}

export interface GlyphRunDrawing {
	readonly type: 'text'
	readonly run: GlyphRun
	readonly foreground: Brush
}

export type DrawingNode = DrawingGroup | GeometryDrawing | GlyphRunDrawing

export interface ViewBox {
	readonly x: number
	readonly y: number
	readonly width: number
	readonly height: number
}

/** Parsed document: the root group plus the intrinsic size the root declared */
export interface DrawingImage {
	readonly drawing: DrawingGroup
	readonly width?: number
	readonly height?: number
	readonly viewBox?: ViewBox
}
