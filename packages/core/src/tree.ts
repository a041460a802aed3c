/**
 * Tree utilities: freezing and traversal
 */

import type { DrawingGroup, DrawingNode, GeometryDrawing, GlyphRunDrawing } from './types'

/**
 * Recursively freeze a value and everything reachable from it.
 * Already-frozen subtrees are not revisited.
 */
export function deepFreeze<T>(value: T): T {
	if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value

	Object.freeze(value)
	for (const key of Object.keys(value)) {
		deepFreeze(Reflect.get(value, key))
	}
	return value
}

/** Visit every node depth-first, parents before children */
export function walkDrawing(node: DrawingNode, visit: (node: DrawingNode, depth: number) => void, depth = 0): void {
	visit(node, depth)
	if (node.type === 'group') {
		for (const child of node.children) {
			walkDrawing(child, visit, depth + 1)
		}
	}
}

/** Collect every node of one kind in document order */
export function collectNodes<K extends DrawingNode['type']>(
	root: DrawingNode,
	type: K
): Extract<DrawingNode, { type: K }>[] {
	const found: Extract<DrawingNode, { type: K }>[] = []
	walkDrawing(root, (node) => {
		if (isNodeOfType(node, type)) found.push(node)
	})
	return found
}

function isNodeOfType<K extends DrawingNode['type']>(
	node: DrawingNode,
	type: K
): node is Extract<DrawingNode, { type: K }> {
	return node.type === type
}

/**
 * Rebuild a group with every shape and text node passed through `map`.
 * Unchanged subtrees keep their identity.
 */
export function mapLeaves(
	group: DrawingGroup,
	map: (leaf: GeometryDrawing | GlyphRunDrawing) => DrawingNode
): DrawingGroup {
	let changed = false
	const children = group.children.map((child) => {
		const next = child.type === 'group' ? mapLeaves(child, map) : map(child)
		if (next !== child) changed = true
		return next
	})
	return changed ? { ...group, children } : group
}
