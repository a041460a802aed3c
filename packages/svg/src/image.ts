/**
 * SvgImage - a parsed document with a recolouring edit session
 */

import type { Brush, DrawingImage } from '@svgdraw/core'
import { parseDocument } from './document'
import { replaceFillBrush, replaceStrokeBrush } from './edit'
import { readSvgBytes, readSvgFile, readSvgStream, readSvgUri } from './load'
import type { UriLoadOptions } from './load'
import type { ParseOptions } from './options'
import { readXml } from './xml'
import type { XmlElement } from './xml'

/**
 * Holds the element tree it was parsed from so `reset` can rebuild the drawing.
 *
 * Edits go to a working copy between `beginEdit` and `endEdit`; `source`
 * shows the working copy while an edit is open.
 *
 * @example
 * const image = SvgImage.fromString(svg)
 * image.beginEdit()
 * image.replaceFillBrush(parseBrush('red'), parseBrush('blue'))
 * image.endEdit()
 */
export class SvgImage {
	private committed: DrawingImage
	private working: DrawingImage | undefined

	private constructor(
		private readonly root: XmlElement,
		private readonly options: ParseOptions
	) {
		this.committed = parseDocument(root, options)
	}

	static fromElement(root: XmlElement, options: ParseOptions = {}): SvgImage {
		return new SvgImage(root, options)
	}

	static fromString(text: string, options: ParseOptions = {}): SvgImage {
		return new SvgImage(readXml(text), options)
	}

	static fromFile(path: string, options: ParseOptions = {}): SvgImage {
		return SvgImage.fromString(readSvgFile(path), options)
	}

	static fromBytes(bytes: Uint8Array | null | undefined, options: ParseOptions = {}): SvgImage {
		return SvgImage.fromString(readSvgBytes(bytes), options)
	}

	static async fromStream(
		stream: AsyncIterable<Uint8Array | string> | null | undefined,
		options: ParseOptions = {}
	): Promise<SvgImage> {
		return SvgImage.fromString(await readSvgStream(stream), options)
	}

	static async fromUri(uri: string, options: UriLoadOptions = {}): Promise<SvgImage> {
		const { resolver, ...parseOptions } = options
		return SvgImage.fromString(await readSvgUri(uri, resolver), parseOptions)
	}

	/** The drawing to render; always frozen */
	get source(): DrawingImage {
		return this.working ?? this.committed
	}

	get isEditing(): boolean {
		return this.working !== undefined
	}

	beginEdit(): void {
		if (this.working) throw new Error('An edit is already in progress')
		this.working = this.committed
	}

	/** Commit the working copy */
	endEdit(): void {
		if (!this.working) throw new Error('No edit in progress')
		this.committed = this.working
		this.working = undefined
	}

	/** Drop the working copy */
	cancelEdit(): void {
		if (!this.working) throw new Error('No edit in progress')
		this.working = undefined
	}

	/** Rebuild the drawing from the original elements; an open edit is discarded */
	reset(): void {
		this.working = undefined
		this.committed = parseDocument(this.root, this.options)
	}

	replaceFillBrush(existing: Brush, replacement: Brush): void {
		this.working = replaceFillBrush(this.requireEdit('replaceFillBrush'), existing, replacement)
	}

	replaceStrokeBrush(existing: Brush, replacement: Brush): void {
		this.working = replaceStrokeBrush(this.requireEdit('replaceStrokeBrush'), existing, replacement)
	}

	private requireEdit(operation: string): DrawingImage {
		if (!this.working) throw new Error(`${operation} requires beginEdit()`)
		return this.working
	}
}
