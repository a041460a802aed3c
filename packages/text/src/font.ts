/**
 * Built-in faces and font property parsing
 */

import type { FontStyle, FontWeight } from '@svgdraw/core'
import arial from './fonts/arial.json'
import type { FontFace } from './types'

export const DEFAULT_FONT_FAMILY = 'Arial'
export const DEFAULT_FONT_SIZE = 12

function toWeight(value: string): FontWeight {
	return value === 'bold' ? 'bold' : 'normal'
}

function toStyle(value: string): FontStyle {
	return value === 'italic' ? 'italic' : value === 'oblique' ? 'oblique' : 'normal'
}

const BUILTIN_FACES: readonly FontFace[] = arial.faces.map((face) => ({
	family: face.family,
	aliases: arial.aliases,
	weight: toWeight(face.weight),
	style: toStyle(face.style),
	unitsPerEm: face.unitsPerEm,
	ascent: face.ascent,
	descent: face.descent,
	firstChar: face.firstChar,
	advanceWidths: face.advanceWidths,
	notdefAdvance: face.notdefAdvance,
}))

/** Faces that ship with the package */
export function getBuiltinFaces(): readonly FontFace[] {
	return BUILTIN_FACES
}

function faceMatchesFamily(face: FontFace, family: string): boolean {
	const wanted = family.toLowerCase()
	return face.family.toLowerCase() === wanted || face.aliases.some((alias) => alias.toLowerCase() === wanted)
}

function pickFace(candidates: readonly FontFace[], weight: FontWeight, style: FontStyle): FontFace | undefined {
	return (
		candidates.find((f) => f.weight === weight && f.style === style) ??
		candidates.find((f) => f.weight === weight) ??
		candidates.find((f) => f.style === style) ??
		candidates[0]
	)
}

/**
 * Split a CSS font-family list into bare family names
 */
export function parseFontFamilyList(value: string): string[] {
	return value
		.split(',')
		.map((name) => name.trim().replace(/^(['"])(.*)\1$/, '$2').trim())
		.filter((name) => name.length > 0)
}

/**
 * Resolve the first family in the list that has a face, falling back to Arial.
 * Extra faces are searched before the built-ins.
 */
export function matchFontFace(
	familyList: string,
	weight: FontWeight = 'normal',
	style: FontStyle = 'normal',
	extraFaces: readonly FontFace[] = []
): FontFace {
	const faces = [...extraFaces, ...BUILTIN_FACES]

	for (const family of parseFontFamilyList(familyList)) {
		const face = pickFace(
			faces.filter((f) => faceMatchesFamily(f, family)),
			weight,
			style
		)
		if (face) return face
	}

	const fallback = pickFace(
		BUILTIN_FACES.filter((f) => faceMatchesFamily(f, DEFAULT_FONT_FAMILY)),
		weight,
		style
	)
	if (!fallback) throw new Error(`Built-in ${DEFAULT_FONT_FAMILY} face is missing`)
	return fallback
}

// ─────────────────────────────────────────────────────────────────────────────
// Property values
// ─────────────────────────────────────────────────────────────────────────────

/** px per unit at 96 DPI */
const LENGTH_UNITS: Readonly<Record<string, number>> = {
	'': 1,
	px: 1,
	pt: 96 / 72,
	pc: 16,
	in: 96,
	cm: 96 / 2.54,
	mm: 96 / 25.4,
}

/**
 * Parse a font-size such as `12`, `9pt` or `0.5in` into px.
 * Returns undefined for anything else, including non-positive sizes.
 */
export function parseFontSize(value: string): number | undefined {
	const match = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z]*)$/i.exec(value.trim())
	if (!match) return undefined

	const unit = LENGTH_UNITS[(match[2] ?? '').toLowerCase()]
	const size = Number.parseFloat(match[1] ?? '')
	if (unit === undefined || !Number.isFinite(size) || size <= 0) return undefined
	return size * unit
}

/** `bold`, `bolder` and numeric weights of 600 and above are bold */
export function parseFontWeight(value: string): FontWeight | undefined {
	const v = value.trim().toLowerCase()
	if (v === 'bold' || v === 'bolder') return 'bold'
	if (v === 'normal' || v === 'lighter') return 'normal'
	if (/^\d+$/.test(v)) return Number.parseInt(v, 10) >= 600 ? 'bold' : 'normal'
	return undefined
}

export function parseFontStyle(value: string): FontStyle | undefined {
	const v = value.trim().toLowerCase()
	if (v === 'normal' || v === 'italic' || v === 'oblique') return v
	return undefined
}
