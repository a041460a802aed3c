/**
 * XML adapter over fast-xml-parser
 * Produces a minimal read-only element tree
 */

import { InvalidDocumentError } from '@svgdraw/core'
import { XMLParser, XMLValidator } from 'fast-xml-parser'

export interface XmlElement {
	/** Qualified name as written, e.g. `svg:rect` */
	readonly name: string
	/** Name without its namespace prefix */
	readonly localName: string
	readonly attributes: ReadonlyMap<string, string>
	readonly children: readonly XmlElement[]
	/** Concatenated text of all descendants; whitespace-only runs are dropped */
	readonly text: string
}

const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: '',
	preserveOrder: true,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: false,
	ignoreDeclaration: true,
	ignorePiTags: true,
	htmlEntities: true,
})

/**
 * Parse XML text and return its root element
 *
 * @throws InvalidDocumentError on malformed XML or a document with no element
 */
export function readXml(text: string): XmlElement {
	const source = text.replace(/^\uFEFF/, '')
	if (source.trim() === '') {
		throw new InvalidDocumentError('Document is empty')
	}

	const validation = XMLValidator.validate(source)
	if (validation !== true) {
		const { msg, line, col } = validation.err
		throw new InvalidDocumentError(`Malformed XML at ${line}:${col}: ${msg}`)
	}

	const ordered: unknown = parser.parse(source)
	const root = toElements(ordered)[0]
	if (!root) {
		throw new InvalidDocumentError('Document has no root element')
	}
	return root
}

/** Value of an attribute by qualified name */
export function attr(element: XmlElement, name: string): string | undefined {
	return element.attributes.get(name)
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function localNameOf(name: string): string {
	const colon = name.indexOf(':')
	return colon < 0 ? name : name.slice(colon + 1)
}

function elementKey(node: Record<string, unknown>): string | undefined {
	return Object.keys(node).find(
		(key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY && !key.startsWith('?') && !key.startsWith('!')
	)
}

function toAttributes(value: unknown): Map<string, string> {
	const attributes = new Map<string, string>()
	if (!isRecord(value)) return attributes
	for (const [name, raw] of Object.entries(value)) {
		if (typeof raw === 'string') attributes.set(name, raw)
		else if (typeof raw === 'number' || typeof raw === 'boolean') attributes.set(name, String(raw))
	}
	return attributes
}

function toElements(nodes: unknown): XmlElement[] {
	if (!Array.isArray(nodes)) return []

	const elements: XmlElement[] = []
	for (const node of nodes) {
		if (!isRecord(node)) continue
		const name = elementKey(node)
		if (name !== undefined) elements.push(toElement(name, node))
	}
	return elements
}

function toElement(name: string, node: Record<string, unknown>): XmlElement {
	const body = node[name]
	const children: XmlElement[] = []
	let text = ''

	if (Array.isArray(body)) {
		for (const item of body) {
			if (!isRecord(item)) continue

			if (TEXT_KEY in item) {
				const value = String(item[TEXT_KEY])
				if (value.trim() !== '') text += value
				continue
			}

			const childName = elementKey(item)
			if (childName === undefined) continue
			const child = toElement(childName, item)
			children.push(child)
			text += child.text
		}
	}

	return {
		name,
		localName: localNameOf(name),
		attributes: toAttributes(node[ATTRIBUTES_KEY]),
		children,
		text,
	}
}
