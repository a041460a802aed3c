import { describe, expect, it } from 'vitest'
import { FormatError } from '@svgdraw/core'
import type { LinearGradientBrush } from '@svgdraw/core'
import {
	applyOpacityToBrush,
	applyOpacityToColor,
	BLACK,
	colorOpacity,
	hslToRgb,
	isTransparentBrush,
	namedColorNames,
	parseBrush,
	parseColor,
	resolveCssColor,
	sameRgb,
	TRANSPARENT,
	tryParseColor,
} from './index'

describe('Color Package', () => {
	describe('parseColor', () => {
		it('should parse hex colors of every length', () => {
			expect(parseColor('#ff0000')).toEqual({ r: 255, g: 0, b: 0, a: 255 })
			expect(parseColor('#f00')).toEqual({ r: 255, g: 0, b: 0, a: 255 })
			expect(parseColor('#f008')).toEqual({ r: 255, g: 0, b: 0, a: 136 })
			expect(parseColor('#11223344')).toEqual({ r: 17, g: 34, b: 51, a: 68 })
		})

		it('should resolve named colors case-insensitively', () => {
			expect(parseColor('Red')).toEqual({ r: 255, g: 0, b: 0, a: 255 })
			expect(parseColor('cornflowerblue')).toEqual({ r: 100, g: 149, b: 237, a: 255 })
			expect(parseColor('transparent')).toEqual({ r: 255, g: 255, b: 255, a: 0 })
		})

		it('should treat any none prefix as transparent', () => {
			expect(parseColor('none')).toBe(TRANSPARENT)
			expect(parseColor('nonesuch')).toBe(TRANSPARENT)
		})

		it('should read rgb() bytes', () => {
			expect(parseColor('rgb(10, 20, 30)')).toEqual({ r: 10, g: 20, b: 30, a: 255 })
		})

		it('should read out-of-range or fractional rgb() components as zero', () => {
			expect(parseColor('rgb(300, 20, 30)')).toEqual({ r: 0, g: 20, b: 30, a: 255 })
			expect(parseColor('rgb(1.5,2,3)')).toEqual({ r: 0, g: 2, b: 3, a: 255 })
			expect(parseColor('rgb(-4,2,3)')).toEqual({ r: 0, g: 2, b: 3, a: 255 })
		})

		it('should return black for rgb() with the wrong component count', () => {
			expect(parseColor('rgb(1,2)')).toBe(BLACK)
			expect(parseColor('rgba(1,2,3,0.5)')).toBe(BLACK)
			expect(parseColor('rgb')).toBe(BLACK)
		})

		it('should parse hsl colors', () => {
			expect(parseColor('hsl(120, 100%, 50%)')).toEqual({ r: 0, g: 255, b: 0, a: 255 })
			expect(parseColor('hsla(0, 100%, 50%, 0.5)')).toEqual({ r: 255, g: 0, b: 0, a: 128 })
		})

		it('should throw FormatError on unknown values', () => {
			expect(() => parseColor('notacolor')).toThrow(FormatError)
			expect(() => parseColor('#12')).toThrow(FormatError)
		})
	})

	describe('parseBrush', () => {
		it('should wrap the color in a solid brush', () => {
			expect(parseBrush('blue')).toEqual({ type: 'solid', color: { r: 0, g: 0, b: 255, a: 255 } })
		})

		it('should throw like parseColor', () => {
			expect(() => parseBrush('url(#x)')).toThrow(FormatError)
		})
	})

	describe('tryParseColor', () => {
		it('should return undefined instead of throwing', () => {
			expect(tryParseColor('bogus')).toBeUndefined()
			expect(tryParseColor('black')).toEqual(BLACK)
		})
	})

	describe('resolveCssColor', () => {
		it('should return null for rgb() which it does not handle', () => {
			expect(resolveCssColor('rgb(1,2,3)')).toBeNull()
		})

		it('should know the named color table', () => {
			const names = namedColorNames()
			expect(names).toContain('rebeccapurple')
			expect(names).toContain('transparent')
		})
	})

	describe('hslToRgb', () => {
		it('should convert gray when saturation is zero', () => {
			expect(hslToRgb(200, 0, 50)).toEqual({ r: 128, g: 128, b: 128 })
		})

		it('should wrap negative hue', () => {
			expect(hslToRgb(-240, 100, 50)).toEqual({ r: 0, g: 255, b: 0 })
		})
	})

	describe('applyOpacityToColor', () => {
		it('should scale and round alpha', () => {
			expect(applyOpacityToColor(BLACK, 0.5)).toEqual({ r: 0, g: 0, b: 0, a: 128 })
			expect(applyOpacityToColor({ r: 1, g: 2, b: 3, a: 100 }, 0.25)).toEqual({ r: 1, g: 2, b: 3, a: 25 })
		})

		it('should return the same color at full opacity', () => {
			expect(applyOpacityToColor(BLACK, 1)).toBe(BLACK)
			expect(applyOpacityToColor(BLACK, 3)).toBe(BLACK)
		})

		it('should clamp negative opacity to zero', () => {
			expect(applyOpacityToColor(BLACK, -1).a).toBe(0)
		})
	})

	describe('applyOpacityToBrush', () => {
		const gradient: LinearGradientBrush = {
			type: 'linear',
			start: { x: 0, y: 0 },
			end: { x: 1, y: 1 },
			stops: [
				{ offset: 0, color: { r: 255, g: 0, b: 0, a: 255 } },
				{ offset: 1, color: { r: 0, g: 0, b: 255, a: 200 } },
			],
			spread: 'pad',
			mappingMode: 'relativeToBoundingBox',
			transform: { type: 'identity' },
		}

		it('should scale every gradient stop and leave the input alone', () => {
			const result = applyOpacityToBrush(gradient, 0.5)
			expect(result.stops.map((s) => s.color.a)).toEqual([128, 100])
			expect(result.stops.map((s) => s.offset)).toEqual([0, 1])
			expect(gradient.stops.map((s) => s.color.a)).toEqual([255, 200])
			expect(result).not.toBe(gradient)
		})

		it('should scale a solid brush', () => {
			expect(applyOpacityToBrush({ type: 'solid', color: BLACK }, 0.2)).toEqual({
				type: 'solid',
				color: { r: 0, g: 0, b: 0, a: 51 },
			})
		})
	})

	describe('helpers', () => {
		it('should compare RGB only', () => {
			expect(sameRgb({ r: 1, g: 2, b: 3, a: 0 }, { r: 1, g: 2, b: 3, a: 255 })).toBe(true)
			expect(sameRgb({ r: 1, g: 2, b: 3, a: 0 }, { r: 1, g: 2, b: 4, a: 0 })).toBe(false)
		})

		it('should report color opacity', () => {
			expect(colorOpacity({ r: 0, g: 0, b: 0, a: 51 })).toBeCloseTo(0.2)
		})

		it('should detect transparent brushes', () => {
			expect(isTransparentBrush({ type: 'solid', color: TRANSPARENT })).toBe(true)
			expect(isTransparentBrush({ type: 'solid', color: BLACK })).toBe(false)
		})
	})
})
