/**
 * Affine matrix operations
 */

import type { Matrix, Point, Transform } from '@svgdraw/core'

export const IDENTITY_MATRIX: Matrix = Object.freeze({ a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 })

export const IDENTITY: Transform = Object.freeze({ type: 'identity' })

function toRadians(degrees: number): number {
	return (degrees * Math.PI) / 180
}

/**
 * Compose two matrices: the result applies `first`, then `second`
 */
export function multiply(first: Matrix, second: Matrix): Matrix {
	return {
		a: first.a * second.a + first.b * second.c,
		b: first.a * second.b + first.b * second.d,
		c: first.c * second.a + first.d * second.c,
		d: first.c * second.b + first.d * second.d,
		e: first.e * second.a + first.f * second.c + second.e,
		f: first.e * second.b + first.f * second.d + second.f,
	}
}

/**
 * Flatten a transform to a single matrix
 */
export function toMatrix(transform: Transform): Matrix {
	switch (transform.type) {
		case 'identity':
			return IDENTITY_MATRIX
		case 'translate':
			return { a: 1, b: 0, c: 0, d: 1, e: transform.x, f: transform.y }
		case 'scale':
			return { a: transform.x, b: 0, c: 0, d: transform.y, e: 0, f: 0 }
		case 'rotate': {
			const rad = toRadians(transform.angle)
			const cos = Math.cos(rad)
			const sin = Math.sin(rad)
			return { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 }
		}
		case 'skewX':
			return { a: 1, b: 0, c: Math.tan(toRadians(transform.angle)), d: 1, e: 0, f: 0 }
		case 'skewY':
			return { a: 1, b: Math.tan(toRadians(transform.angle)), c: 0, d: 1, e: 0, f: 0 }
		case 'matrix':
			return transform.matrix
		case 'group':
			return transform.children.reduce<Matrix>((acc, child) => multiply(acc, toMatrix(child)), IDENTITY_MATRIX)
	}
}

export function transformPoint(matrix: Matrix, point: Point): Point {
	return {
		x: matrix.a * point.x + matrix.c * point.y + matrix.e,
		y: matrix.b * point.x + matrix.d * point.y + matrix.f,
	}
}

export function isIdentityMatrix(m: Matrix): boolean {
	return m.a === 1 && m.b === 0 && m.c === 0 && m.d === 1 && m.e === 0 && m.f === 0
}

/** True when the transform leaves every point where it is */
export function isIdentity(transform: Transform): boolean {
	return transform.type === 'identity' || isIdentityMatrix(toMatrix(transform))
}

/**
 * Build the transform that applies each argument in turn.
 * Identities are dropped; one survivor comes back unwrapped.
 */
export function composeTransforms(...transforms: Transform[]): Transform {
	const parts = transforms.filter((t) => t.type !== 'identity')
	const [only] = parts
	if (parts.length === 0 || !only) return IDENTITY
	if (parts.length === 1) return only
	return { type: 'group', children: parts }
}
