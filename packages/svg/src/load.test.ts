import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { pathToFileURL } from 'node:url'
import { describe, expect, it } from 'vitest'
import { EmptyInputError, InvalidDocumentError } from '@svgdraw/core'
import { loadSvgBytes, loadSvgFile, loadSvgStream, loadSvgUri, resolveUri } from './load'

const SVG = '<svg><rect width="1" height="1"/></svg>'

function tempFile(name: string, content: string): string {
	const dir = mkdtempSync(join(tmpdir(), 'svgdraw-load-'))
	const path = join(dir, name)
	writeFileSync(path, content)
	return path
}

describe('loadSvgFile', () => {
	it('should parse a file', () => {
		expect(loadSvgFile(tempFile('a.svg', SVG)).drawing.children).toHaveLength(1)
	})

	it('should reject a document whose root is not svg', () => {
		expect(() => loadSvgFile(tempFile('b.svg', '<html/>'))).toThrow(InvalidDocumentError)
	})

	it('should wrap read failures', () => {
		const missing = join(tmpdir(), 'svgdraw-does-not-exist', 'x.svg')
		expect(() => loadSvgFile(missing)).toThrow(InvalidDocumentError)
		expect(() => loadSvgFile(missing)).toThrow(`Failed to read SVG ${missing}: `)
	})
})

describe('loadSvgBytes', () => {
	it('should decode UTF-8', () => {
		const image = loadSvgBytes(new TextEncoder().encode('\uFEFF<svg width="7"/>'))
		expect(image.width).toBe(7)
	})

	it('should reject missing or empty bytes', () => {
		expect(() => loadSvgBytes(null)).toThrow(EmptyInputError)
		expect(() => loadSvgBytes(undefined)).toThrow(EmptyInputError)
		expect(() => loadSvgBytes(new Uint8Array())).toThrow('Input contains no data')
	})
})

describe('loadSvgStream', () => {
	it('should join chunks of bytes and strings', async () => {
		const stream = Readable.from([new TextEncoder().encode('<svg><rect/>'), '<circle/></svg>'])
		const image = await loadSvgStream(stream)
		expect(image.drawing.children.map((c) => c.type)).toEqual(['shape', 'shape'])
	})

	it('should reject empty or missing streams', async () => {
		await expect(loadSvgStream(Readable.from([]))).rejects.toThrow('Stream contains no data')
		await expect(loadSvgStream(null)).rejects.toThrow(EmptyInputError)
	})

	it('should reject a document whose root is not svg', async () => {
		await expect(loadSvgStream(Readable.from(['<html/>']))).rejects.toThrow(InvalidDocumentError)
	})
})

describe('loadSvgUri', () => {
	it('should parse what the resolver returns', async () => {
		const seen: string[] = []
		const image = await loadSvgUri('mem://one', {
			resolver: async (uri) => {
				seen.push(uri)
				return SVG
			},
		})
		expect(seen).toEqual(['mem://one'])
		expect(image.drawing.children).toHaveLength(1)
	})

	it('should pass parse options through', async () => {
		const image = await loadSvgUri('mem://text', {
			resolver: async () => '<svg><text>a</text></svg>',
			pixelsPerDip: 2,
		})
		const node = image.drawing.children[0]
		expect(node?.type === 'text' && node.run.pixelsPerDip).toBe(2)
	})

	it('should wrap resolver failures', async () => {
		const failing = loadSvgUri('mem://x', {
			resolver: async () => {
				throw new Error('boom')
			},
		})
		await expect(failing).rejects.toThrow('Failed to read SVG mem://x: boom')
	})

	it('should reject empty content', async () => {
		await expect(loadSvgUri('mem://empty', { resolver: async () => '' })).rejects.toThrow(EmptyInputError)
		await expect(loadSvgUri('mem://empty', { resolver: async () => new Uint8Array() })).rejects.toThrow(
			EmptyInputError
		)
	})

	it('should read file URIs by default', async () => {
		const url = pathToFileURL(tempFile('c.svg', SVG)).href
		expect((await loadSvgUri(url)).drawing.children).toHaveLength(1)
	})
})

describe('resolveUri', () => {
	it('should reject unsupported schemes', async () => {
		await expect(resolveUri('ftp://example/x.svg')).rejects.toThrow('Unsupported URI scheme: ftp://example/x.svg')
	})
})
