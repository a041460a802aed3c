import { describe, expect, it } from 'vitest'
import { FormatError } from '@svgdraw/core'
import type { Matrix, Transform } from '@svgdraw/core'
import {
	composeTransforms,
	IDENTITY,
	IDENTITY_MATRIX,
	isIdentity,
	multiply,
	parseTransform,
	toMatrix,
	transformPoint,
} from './index'

function expectMatrixClose(actual: Matrix, expected: [number, number, number, number, number, number]): void {
	const values = [actual.a, actual.b, actual.c, actual.d, actual.e, actual.f]
	values.forEach((v, i) => {
		expect(v).toBeCloseTo(expected[i] ?? Number.NaN, 10)
	})
}

describe('Transform', () => {
	describe('parseTransform', () => {
		it('should return identity for empty input', () => {
			expect(parseTransform('')).toBe(IDENTITY)
			expect(parseTransform('   ')).toBe(IDENTITY)
		})

		it('should return identity for none', () => {
			expect(parseTransform('none')).toBe(IDENTITY)
			expect(parseTransform('translate(1,2) none')).toBe(IDENTITY)
			expect(parseTransform('none(3)')).toBe(IDENTITY)
		})

		it('should unwrap a single command', () => {
			expect(parseTransform('translate(10,20)')).toEqual({ type: 'translate', x: 10, y: 20 })
			expect(parseTransform('translate(10)')).toEqual({ type: 'translate', x: 10, y: 0 })
			expect(parseTransform('scale(2)')).toEqual({ type: 'scale', x: 2, y: 2 })
			expect(parseTransform('scale(2 3)')).toEqual({ type: 'scale', x: 2, y: 3 })
			expect(parseTransform('rotate(45)')).toEqual({ type: 'rotate', angle: 45 })
			expect(parseTransform('skewX(30)')).toEqual({ type: 'skewX', angle: 30 })
			expect(parseTransform('skewY(-1.5e1)')).toEqual({ type: 'skewY', angle: -15 })
		})

		it('should group several commands in source order', () => {
			expect(parseTransform('translate(1 , 2),scale(3)')).toEqual({
				type: 'group',
				children: [
					{ type: 'translate', x: 1, y: 2 },
					{ type: 'scale', x: 3, y: 3 },
				],
			})
		})

		it('should read matrix with six values', () => {
			expect(parseTransform('matrix(1 2 3 4 5 6)')).toEqual({
				type: 'matrix',
				matrix: { a: 1, b: 2, c: 3, d: 4, e: 5, f: 6 },
			})
		})

		it('should ignore matrix, translate and scale with other arities', () => {
			expect(parseTransform('matrix(1,2,3)')).toBe(IDENTITY)
			expect(parseTransform('translate(1,2,3)')).toBe(IDENTITY)
			expect(parseTransform('scale()')).toBe(IDENTITY)
			expect(parseTransform('matrix(1,2,3) translate(4)')).toEqual({ type: 'translate', x: 4, y: 0 })
		})

		it('should throw FormatError on an unknown command', () => {
			expect(() => parseTransform('spin(3)')).toThrow(FormatError)
			expect(() => parseTransform('Translate(1)')).toThrow(FormatError)
		})

		it('should throw FormatError on a bad number', () => {
			expect(() => parseTransform('translate(a)')).toThrow(FormatError)
			expect(() => parseTransform('scale(1px)')).toThrow(FormatError)
		})

		it('should throw FormatError on a missing parenthesis', () => {
			expect(() => parseTransform('translate(1')).toThrow(FormatError)
			expect(() => parseTransform('translate')).toThrow(FormatError)
		})

		it('should reject rotate around a center point', () => {
			expect(() => parseTransform('rotate(45, 10, 10)')).toThrow(FormatError)
			expect(() => parseTransform('skewX()')).toThrow(FormatError)
		})
	})

	describe('toMatrix', () => {
		it('should build a rotation matrix', () => {
			const half = Math.SQRT2 / 2
			expectMatrixClose(toMatrix(parseTransform('rotate(45)')), [half, half, -half, half, 0, 0])
			expectMatrixClose(toMatrix(parseTransform('rotate(-45)')), [half, -half, half, half, 0, 0])
		})

		it('should build skew matrices', () => {
			expectMatrixClose(toMatrix(parseTransform('skewX(30)')), [1, 0, Math.tan(Math.PI / 6), 1, 0, 0])
			expectMatrixClose(toMatrix(parseTransform('skewY(30)')), [1, Math.tan(Math.PI / 6), 0, 1, 0, 0])
		})

		it('should compose a group left to right', () => {
			expect(toMatrix(parseTransform('translate(10,20) scale(2,3)'))).toEqual({ a: 2, b: 0, c: 0, d: 3, e: 20, f: 60 })
			expect(toMatrix(parseTransform('scale(2,3) translate(10,20)'))).toEqual({ a: 2, b: 0, c: 0, d: 3, e: 10, f: 20 })
		})

		it('should flatten identity', () => {
			expect(toMatrix(IDENTITY)).toBe(IDENTITY_MATRIX)
		})
	})

	describe('multiply', () => {
		it('should treat identity as neutral', () => {
			const m: Matrix = { a: 1, b: 2, c: 3, d: 4, e: 5, f: 6 }
			expect(multiply(IDENTITY_MATRIX, m)).toEqual(m)
			expect(multiply(m, IDENTITY_MATRIX)).toEqual(m)
		})
	})

	describe('transformPoint', () => {
		it('should apply the first listed transform first', () => {
			const m = toMatrix(parseTransform('translate(10,20) scale(2,3)'))
			expect(transformPoint(m, { x: 1, y: 1 })).toEqual({ x: 22, y: 63 })
		})
	})

	describe('isIdentity', () => {
		it('should detect transforms that move nothing', () => {
			expect(isIdentity(IDENTITY)).toBe(true)
			expect(isIdentity({ type: 'translate', x: 0, y: 0 })).toBe(true)
			expect(isIdentity({ type: 'scale', x: 2, y: 2 })).toBe(false)
		})
	})

	describe('composeTransforms', () => {
		const move: Transform = { type: 'translate', x: 1, y: 1 }

		it('should drop identities and unwrap a single part', () => {
			expect(composeTransforms(IDENTITY, move)).toBe(move)
			expect(composeTransforms(IDENTITY, IDENTITY)).toBe(IDENTITY)
		})

		it('should group several parts', () => {
			expect(composeTransforms(move, { type: 'rotate', angle: 90 })).toEqual({
				type: 'group',
				children: [move, { type: 'rotate', angle: 90 }],
			})
		})
	})
})
