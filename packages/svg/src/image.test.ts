import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { parseBrush } from '@svgdraw/color'
import { EmptyInputError } from '@svgdraw/core'
import type { DrawingImage } from '@svgdraw/core'
import { SvgImage } from './image'

const SVG = '<svg width="4" height="4"><rect fill="red" width="4" height="4"/></svg>'

function fillOf(image: DrawingImage) {
	const node = image.drawing.children[0]
	if (node?.type !== 'shape') throw new Error('expected shape')
	return node.fill
}

const RED = { type: 'solid', color: { r: 255, g: 0, b: 0, a: 255 } }
const BLUE = { type: 'solid', color: { r: 0, g: 0, b: 255, a: 255 } }

describe('SvgImage', () => {
	it('should expose a frozen source', () => {
		const image = SvgImage.fromString(SVG)
		expect(image.isEditing).toBe(false)
		expect(image.source.width).toBe(4)
		expect(Object.isFrozen(image.source)).toBe(true)
	})

	it('should commit edits on endEdit', () => {
		const image = SvgImage.fromString(SVG)
		image.beginEdit()
		image.replaceFillBrush(parseBrush('red'), parseBrush('blue'))

		expect(image.isEditing).toBe(true)
		expect(fillOf(image.source)).toEqual(BLUE)

		image.endEdit()
		expect(image.isEditing).toBe(false)
		expect(fillOf(image.source)).toEqual(BLUE)
	})

	it('should drop edits on cancelEdit', () => {
		const image = SvgImage.fromString(SVG)
		const before = image.source
		image.beginEdit()
		image.replaceFillBrush(parseBrush('red'), parseBrush('blue'))
		image.cancelEdit()

		expect(image.source).toBe(before)
	})

	it('should rebuild the original drawing on reset', () => {
		const image = SvgImage.fromString(SVG)
		const original = image.source
		image.beginEdit()
		image.replaceFillBrush(parseBrush('red'), parseBrush('blue'))
		image.endEdit()
		image.beginEdit()

		image.reset()
		expect(image.isEditing).toBe(false)
		expect(fillOf(image.source)).toEqual(RED)
		expect(image.source).toEqual(original)
		expect(image.source).not.toBe(original)
	})

	it('should replace stroke brushes', () => {
		const image = SvgImage.fromString('<svg><line stroke="red" stroke-width="2"/></svg>')
		image.beginEdit()
		image.replaceStrokeBrush(parseBrush('red'), parseBrush('blue'))
		image.endEdit()

		const node = image.source.drawing.children[0]
		expect(node?.type === 'shape' && node.stroke?.thickness).toBe(2)
		expect(node?.type === 'shape' && node.stroke?.brush).toEqual(BLUE)
	})

	it('should reject edit calls out of order', () => {
		const image = SvgImage.fromString(SVG)
		expect(() => image.endEdit()).toThrow('No edit in progress')
		expect(() => image.cancelEdit()).toThrow('No edit in progress')
		expect(() => image.replaceFillBrush(parseBrush('red'), parseBrush('blue'))).toThrow(
			'replaceFillBrush requires beginEdit()'
		)

		image.beginEdit()
		expect(() => image.beginEdit()).toThrow('An edit is already in progress')
	})

	it('should load from bytes, streams, files and URIs', async () => {
		const bytes = new TextEncoder().encode(SVG)
		expect(fillOf(SvgImage.fromBytes(bytes).source)).toEqual(RED)

		const streamed = await SvgImage.fromStream(Readable.from([SVG.slice(0, 10), SVG.slice(10)]))
		expect(streamed.source.height).toBe(4)

		const dir = mkdtempSync(join(tmpdir(), 'svgdraw-image-'))
		const path = join(dir, 'image.svg')
		writeFileSync(path, SVG)
		expect(SvgImage.fromFile(path).source.width).toBe(4)

		const fromUri = await SvgImage.fromUri('mem://image', { resolver: async () => bytes })
		expect(fillOf(fromUri.source)).toEqual(RED)
	})

	it('should reject empty input', async () => {
		expect(() => SvgImage.fromBytes(new Uint8Array())).toThrow(EmptyInputError)
		await expect(SvgImage.fromStream(Readable.from([]))).rejects.toThrow(EmptyInputError)
	})
})
