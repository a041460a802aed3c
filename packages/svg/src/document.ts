/**
 * Document walker: XML element tree -> frozen DrawingImage
 */

import { deepFreeze, InvalidDocumentError } from '@svgdraw/core'
import type { DrawingGroup, DrawingImage, DrawingNode, ViewBox } from '@svgdraw/core'
import { isIdentity } from '@svgdraw/transform'
import type { InheritedGroupState } from './cascade'
import { createElementContext, deriveGroupState, groupTransform, ROOT_GROUP_STATE } from './cascade'
import { convertGradient, isGradientElement } from './gradient'
import type { ParseOptions, ResolvedParseOptions } from './options'
import { resolveOptions, warn } from './options'
import { DefinitionsRegistry } from './registry'
import { convertShape, isShapeElement } from './shapes'
import { convertText } from './text'
import { parseLength, scanNumbers } from './values'
import { attr, readXml } from './xml'
import type { XmlElement } from './xml'

/** State shared by every element of one parse */
interface ParseSession {
	readonly registry: DefinitionsRegistry
	readonly options: ResolvedParseOptions
}

// ─────────────────────────────────────────────────────────────────────────────
// Walker
// ─────────────────────────────────────────────────────────────────────────────

function convertGroup(element: XmlElement, inherited: InheritedGroupState, session: ParseSession): DrawingGroup {
	const state = deriveGroupState(element, inherited)
	const children: DrawingNode[] = []

	for (const child of element.children) {
		const node = convertElement(child, state, session)
		if (node) children.push(node)
	}

	const transform = groupTransform(element)
	return transform && !isIdentity(transform) ? { type: 'group', children, transform } : { type: 'group', children }
}

/** Register a gradient under its id; gradients never draw anything themselves */
function registerGradient(element: XmlElement, inherited: InheritedGroupState, session: ParseSession): void {
	const id = attr(element, 'id')
	if (id === undefined) return

	const brush = convertGradient(createElementContext(element, session.registry, inherited, session.options))
	if (brush) session.registry.register(id, { kind: 'brush', value: brush })
}

function convertElement(
	element: XmlElement,
	inherited: InheritedGroupState,
	session: ParseSession
): DrawingNode | undefined {
	const { localName } = element

	if (localName === 'g') return convertGroup(element, inherited, session)
	if (localName === 'defs') {
		populateDefinitions(element, session.registry, session.options, inherited)
		return undefined
	}
	if (isGradientElement(localName)) {
		registerGradient(element, inherited, session)
		return undefined
	}

	const ctx = createElementContext(element, session.registry, inherited, session.options)
	if (localName === 'text') return convertText(ctx)
	if (isShapeElement(localName)) return convertShape(ctx)

	warn(session.options, `Skipping unsupported element <${element.name}>`)
	return undefined
}

/**
 * Register the direct children of a `<defs>` block by id.
 * Gradients become brushes; shapes, groups and text become drawings.
 * Children without an id are unreachable and skipped.
 */
export function populateDefinitions(
	defs: XmlElement,
	registry: DefinitionsRegistry,
	options: ResolvedParseOptions,
	inherited: InheritedGroupState = ROOT_GROUP_STATE
): void {
	const session: ParseSession = { registry, options }

	for (const child of defs.children) {
		const id = attr(child, 'id')
		if (id === undefined) continue

		if (isGradientElement(child.localName)) {
			registerGradient(child, inherited, session)
			continue
		}

		const node = convertElement(child, inherited, session)
		if (node) registry.register(id, { kind: 'drawing', value: node })
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Root
// ─────────────────────────────────────────────────────────────────────────────

function parseViewBox(root: XmlElement, options: ResolvedParseOptions): ViewBox | undefined {
	const raw = attr(root, 'viewBox')
	if (raw === undefined) return undefined

	const [x, y, width, height] = scanNumbers(raw)
	if (x === undefined || y === undefined || width === undefined || height === undefined || width < 0 || height < 0) {
		warn(options, `Ignoring invalid viewBox '${raw}'`)
		return undefined
	}
	return { x, y, width, height }
}

/**
 * Convert a parsed `<svg>` element tree.
 * Each call owns a fresh definitions registry.
 *
 * @throws InvalidDocumentError when the root is not `<svg>`
 * @throws FormatError from a malformed transform
 */
export function parseDocument(root: XmlElement, options: ParseOptions = {}): DrawingImage {
	if (root.localName !== 'svg') {
		throw new InvalidDocumentError(`Root element must be <svg>, found <${root.name}>`)
	}

	const resolved = resolveOptions(options)
	const session: ParseSession = { registry: new DefinitionsRegistry(), options: resolved }
	const drawing = convertGroup(root, ROOT_GROUP_STATE, session)

	const width = parseLength(attr(root, 'width'))
	const height = parseLength(attr(root, 'height'))
	const viewBox = parseViewBox(root, resolved)

	return deepFreeze({
		drawing,
		...(width === undefined ? {} : { width }),
		...(height === undefined ? {} : { height }),
		...(viewBox ? { viewBox } : {}),
	})
}

/**
 * Parse SVG text into a frozen DrawingImage
 *
 * @throws InvalidDocumentError on malformed XML or a non-svg root
 * @throws FormatError from a malformed transform
 */
export function parseSvg(text: string, options: ParseOptions = {}): DrawingImage {
	return parseDocument(readXml(text), options)
}
