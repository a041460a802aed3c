/**
 * Path data (`d` attribute) evaluator
 *
 * Commands are read one argument group at a time and turned straight into
 * figures with absolute coordinates. Smooth curves are expanded to full ones.
 */

import type { PathFigure, PathSegment, Point } from '@svgdraw/core'

export interface PathDataResult {
	readonly figures: PathFigure[]
	/** Set when parsing stopped early; figures hold everything read before that */
	readonly error?: string
}

/** Arguments per command */
const ARITY: Readonly<Record<string, number>> = {
	M: 2,
	L: 2,
	H: 1,
	V: 1,
	C: 6,
	S: 4,
	Q: 4,
	T: 2,
	A: 7,
	Z: 0,
}

// ─────────────────────────────────────────────────────────────────────────────
// Scanner
// ─────────────────────────────────────────────────────────────────────────────

const NUMBER_AT = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y

class PathScanner {
	private pos = 0

	constructor(private readonly text: string) {}

	get position(): number {
		return this.pos
	}

	get current(): string {
		return this.text.charAt(this.pos)
	}

	atEnd(): boolean {
		return this.pos >= this.text.length
	}

	skipSeparators(): void {
		while (!this.atEnd() && /[\s,]/.test(this.current)) this.pos++
	}

	/** Consume a command letter if one is next */
	readCommand(): string | undefined {
		this.skipSeparators()
		const letter = this.current
		if (letter === '' || ARITY[letter.toUpperCase()] === undefined) return undefined
		this.pos++
		return letter
	}

	startsNumber(): boolean {
		this.skipSeparators()
		return /[\d.+-]/.test(this.current)
	}

	readNumber(): number | undefined {
		this.skipSeparators()
		NUMBER_AT.lastIndex = this.pos
		const match = NUMBER_AT.exec(this.text)
		if (!match) return undefined
		this.pos = NUMBER_AT.lastIndex
		return Number.parseFloat(match[0])
	}

	/** Arc flags are single characters, so `a1 1 0 01 5 5` reads as 0, 1 */
	readFlag(): number | undefined {
		this.skipSeparators()
		const c = this.current
		if (c !== '0' && c !== '1') return undefined
		this.pos++
		return c === '1' ? 1 : 0
	}
}

function readArguments(scanner: PathScanner, command: string): number[] | undefined {
	const count = ARITY[command] ?? 0
	const args: number[] = []
	for (let i = 0; i < count; i++) {
		const value = command === 'A' && (i === 3 || i === 4) ? scanner.readFlag() : scanner.readNumber()
		if (value === undefined) return undefined
		args.push(value)
	}
	return args
}

// ─────────────────────────────────────────────────────────────────────────────
// Figure builder
// ─────────────────────────────────────────────────────────────────────────────

class FigureBuilder {
	readonly figures: PathFigure[] = []
	private start: Point = { x: 0, y: 0 }
	private segments: PathSegment[] | undefined
	private point: Point = { x: 0, y: 0 }
	/** Second control point of the previous C or S */
	private cubicControl: Point | undefined
	/** Control point of the previous Q or T */
	private quadraticControl: Point | undefined

	get current(): Point {
		return this.point
	}

	moveTo(to: Point): void {
		this.finish(false)
		this.start = to
		this.point = to
		this.segments = []
		this.resetControls()
	}

	lineTo(to: Point): void {
		this.push({ type: 'line', to })
		this.resetControls()
	}

	cubicTo(control1: Point, control2: Point, to: Point): void {
		this.push({ type: 'cubic', control1, control2, to })
		this.cubicControl = control2
		this.quadraticControl = undefined
	}

	smoothCubicTo(control2: Point, to: Point): void {
		this.cubicTo(reflect(this.cubicControl, this.point), control2, to)
	}

	quadraticTo(control: Point, to: Point): void {
		this.push({ type: 'quadratic', control, to })
		this.quadraticControl = control
		this.cubicControl = undefined
	}

	smoothQuadraticTo(to: Point): void {
		this.quadraticTo(reflect(this.quadraticControl, this.point), to)
	}

	arcTo(radiusX: number, radiusY: number, rotation: number, largeArc: boolean, sweep: boolean, to: Point): void {
		if (to.x === this.point.x && to.y === this.point.y) {
			this.resetControls()
			return
		}
		if (radiusX === 0 || radiusY === 0) {
			this.lineTo(to)
			return
		}
		this.push({ type: 'arc', radiusX: Math.abs(radiusX), radiusY: Math.abs(radiusY), rotation, largeArc, sweep, to })
		this.resetControls()
	}

	close(): void {
		this.finish(true)
		this.point = this.start
		this.resetControls()
	}

	/** Emit the open figure, dropping it when nothing was drawn */
	finish(closed: boolean): void {
		if (this.segments && (this.segments.length > 0 || closed)) {
			this.figures.push({ start: this.start, segments: this.segments, closed })
		}
		this.segments = undefined
	}

	private push(segment: PathSegment): void {
		// drawing after Z starts a new figure at the subpath start
		if (!this.segments) {
			this.start = this.point
			this.segments = []
		}
		this.segments.push(segment)
		this.point = segment.type === 'polyline' ? (segment.points.at(-1) ?? this.point) : segment.to
	}

	private resetControls(): void {
		this.cubicControl = undefined
		this.quadraticControl = undefined
	}
}

function reflect(control: Point | undefined, about: Point): Point {
	if (!control) return about
	return { x: 2 * about.x - control.x, y: 2 * about.y - control.y }
}

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation
// ─────────────────────────────────────────────────────────────────────────────

function apply(builder: FigureBuilder, letter: string, args: readonly number[]): void {
	const relative = letter !== letter.toUpperCase()
	const origin = builder.current
	const at = (i: number): Point => {
		const x = args[i] ?? 0
		const y = args[i + 1] ?? 0
		return relative ? { x: origin.x + x, y: origin.y + y } : { x, y }
	}
	const n = (i: number): number => args[i] ?? 0

	switch (letter.toUpperCase()) {
		case 'M':
			builder.moveTo(at(0))
			break
		case 'L':
			builder.lineTo(at(0))
			break
		case 'H':
			builder.lineTo({ x: relative ? origin.x + n(0) : n(0), y: origin.y })
			break
		case 'V':
			builder.lineTo({ x: origin.x, y: relative ? origin.y + n(0) : n(0) })
			break
		case 'C':
			builder.cubicTo(at(0), at(2), at(4))
			break
		case 'S':
			builder.smoothCubicTo(at(0), at(2))
			break
		case 'Q':
			builder.quadraticTo(at(0), at(2))
			break
		case 'T':
			builder.smoothQuadraticTo(at(0))
			break
		case 'A':
			builder.arcTo(n(0), n(1), n(2), n(3) !== 0, n(4) !== 0, at(5))
			break
	}
}

/**
 * Evaluate path data into figures.
 * Invalid data stops evaluation; what was read before it is kept.
 */
export function parsePathData(d: string): PathDataResult {
	const scanner = new PathScanner(d)
	const builder = new FigureBuilder()

	const stop = (error: string): PathDataResult => {
		builder.finish(false)
		return { figures: builder.figures, error }
	}

	let first = true
	while (true) {
		const letter = scanner.readCommand()
		if (letter === undefined) {
			scanner.skipSeparators()
			if (scanner.atEnd()) break
			return stop(`Unexpected '${scanner.current}' at offset ${scanner.position}`)
		}

		const command = letter.toUpperCase()
		if (first && command !== 'M') {
			return stop(`Path data must begin with a moveto, found '${letter}'`)
		}
		first = false

		if (command === 'Z') {
			builder.close()
			continue
		}

		// subsequent pairs after a moveto are implicit linetos
		let repeated = letter
		do {
			const args = readArguments(scanner, command)
			if (!args) return stop(`Missing arguments for '${letter}' at offset ${scanner.position}`)
			apply(builder, repeated, args)
			if (command === 'M') repeated = repeated === 'M' ? 'L' : 'l'
		} while (scanner.startsNumber())
	}

	builder.finish(false)
	return { figures: builder.figures }
}
