/**
 * Transform attribute parser
 *
 * Grammar: commands separated by whitespace or commas, each `name(params)`
 * with params separated by whitespace or commas. Commands apply left to right.
 */

import { FormatError } from '@svgdraw/core'
import type { Transform } from '@svgdraw/core'
import { IDENTITY } from './matrix'

const COMMANDS = new Set(['translate', 'scale', 'rotate', 'skewX', 'skewY', 'matrix'])

const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Parse a transform string.
 * `none` anywhere a command name is expected yields identity for the whole input.
 *
 * @throws FormatError on an unknown command, a non-numeric parameter or a missing `)`
 */
export function parseTransform(text: string): Transform {
	const source = text.trim()
	if (source === '' || source === 'none') return IDENTITY

	const transforms: Transform[] = []
	let pos = 0

	while (pos < source.length) {
		while (pos < source.length && isSeparator(source.charAt(pos))) pos++
		if (pos >= source.length) break

		const open = source.indexOf('(', pos)
		const name = (open < 0 ? source.slice(pos) : source.slice(pos, open)).trim()
		if (name === 'none') return IDENTITY
		if (!COMMANDS.has(name)) {
			throw new FormatError(`Unknown transform '${name}' at offset ${pos}`)
		}
		if (open < 0) {
			throw new FormatError(`Expected '(' after '${name}'`)
		}

		const close = source.indexOf(')', open + 1)
		if (close < 0) {
			throw new FormatError(`Missing ')' for '${name}' at offset ${open}`)
		}

		const params = source
			.slice(open + 1, close)
			.split(/[\s,]+/)
			.filter((token) => token.length > 0)
			.map((token) => parseNumber(token, name))

		const transform = buildTransform(name, params)
		if (transform) transforms.push(transform)
		pos = close + 1
	}

	const [first] = transforms
	if (!first) return IDENTITY
	if (transforms.length === 1) return first
	return { type: 'group', children: transforms }
}

function isSeparator(ch: string): boolean {
	return ch === ',' || /\s/.test(ch)
}

function parseNumber(token: string, command: string): number {
	if (!NUMBER.test(token)) {
		throw new FormatError(`Invalid number '${token}' in ${command}()`)
	}
	return Number.parseFloat(token)
}

/** null means the arity is one the grammar ignores */
function buildTransform(name: string, p: number[]): Transform | null {
	switch (name) {
		case 'translate':
			if (p.length === 1) return { type: 'translate', x: p[0] ?? 0, y: 0 }
			if (p.length === 2) return { type: 'translate', x: p[0] ?? 0, y: p[1] ?? 0 }
			return null
		case 'scale':
			if (p.length === 1) return { type: 'scale', x: p[0] ?? 1, y: p[0] ?? 1 }
			if (p.length === 2) return { type: 'scale', x: p[0] ?? 1, y: p[1] ?? 1 }
			return null
		case 'rotate':
		case 'skewX':
		case 'skewY': {
			const [angle] = p
			if (p.length !== 1 || angle === undefined) {
				throw new FormatError(`${name}() takes exactly one angle, got ${p.length} values`)
			}
			return name === 'rotate' ? { type: 'rotate', angle } : name === 'skewX' ? { type: 'skewX', angle } : { type: 'skewY', angle }
		}
		case 'matrix': {
			const [a, b, c, d, e, f] = p
			if (p.length !== 6 || a === undefined || b === undefined || c === undefined || d === undefined || e === undefined || f === undefined) {
				return null
			}
			return { type: 'matrix', matrix: { a, b, c, d, e, f } }
		}
		default:
			return null
	}
}
