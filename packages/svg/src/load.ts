/**
 * Loaders: files, bytes, streams and URIs
 */

import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { EmptyInputError, InvalidDocumentError } from '@svgdraw/core'
import type { DrawingImage } from '@svgdraw/core'
import { parseSvg } from './document'
import type { ParseOptions } from './options'

/** Fetches the bytes behind a URI */
export type UriResolver = (uri: string) => Promise<Uint8Array | string>

export interface UriLoadOptions extends ParseOptions {
	/** Defaults to fetch for http(s) and the file system for file: URIs */
	resolver?: UriResolver
}

const decoder = new TextDecoder('utf-8')
const encoder = new TextEncoder()

function decode(bytes: Uint8Array): string {
	return decoder.decode(bytes)
}

// ─────────────────────────────────────────────────────────────────────────────
// Readers: source -> SVG text
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @throws InvalidDocumentError when the file cannot be read
 */
export function readSvgFile(path: string): string {
	try {
		return decode(readFileSync(path))
	} catch (err) {
		throw new InvalidDocumentError(InvalidDocumentError.buildMessage(path, err), { cause: err })
	}
}

/**
 * @throws EmptyInputError when there are no bytes
 */
export function readSvgBytes(bytes: Uint8Array | null | undefined): string {
	if (!bytes || bytes.length === 0) throw new EmptyInputError()
	return decode(bytes)
}

/**
 * Read a stream to its end. Node readables qualify.
 *
 * @throws EmptyInputError when the stream is missing or yields nothing
 */
export async function readSvgStream(stream: AsyncIterable<Uint8Array | string> | null | undefined): Promise<string> {
	if (!stream) throw new EmptyInputError('No stream given')

	const chunks: Uint8Array[] = []
	let total = 0
	for await (const chunk of stream) {
		const bytes = typeof chunk === 'string' ? encoder.encode(chunk) : chunk
		chunks.push(bytes)
		total += bytes.length
	}
	if (total === 0) throw new EmptyInputError('Stream contains no data')

	const joined = new Uint8Array(total)
	let offset = 0
	for (const chunk of chunks) {
		joined.set(chunk, offset)
		offset += chunk.length
	}
	return decode(joined)
}

/** Default resolver: fetch for http(s), the file system for file: URIs */
export async function resolveUri(uri: string): Promise<Uint8Array> {
	if (uri.startsWith('http://') || uri.startsWith('https://')) {
		const response = await fetch(uri)
		if (!response.ok) {
			throw new Error(`Failed to fetch ${uri}: ${response.status} ${response.statusText}`)
		}
		return new Uint8Array(await response.arrayBuffer())
	}
	if (uri.startsWith('file:')) {
		return readFile(fileURLToPath(uri))
	}
	throw new Error(`Unsupported URI scheme: ${uri}`)
}

/**
 * @throws InvalidDocumentError when the resolver fails
 * @throws EmptyInputError when the resolver returns nothing
 */
export async function readSvgUri(uri: string, resolver: UriResolver = resolveUri): Promise<string> {
	let content: Uint8Array | string
	try {
		content = await resolver(uri)
	} catch (err) {
		throw new InvalidDocumentError(InvalidDocumentError.buildMessage(uri, err), { cause: err })
	}

	if (typeof content !== 'string') return readSvgBytes(content)
	if (content === '') throw new EmptyInputError()
	return content
}

// ─────────────────────────────────────────────────────────────────────────────
// Loaders: source -> DrawingImage
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read and parse an SVG file
 *
 * @throws InvalidDocumentError when the file cannot be read or is not an SVG document
 */
export function loadSvgFile(path: string, options: ParseOptions = {}): DrawingImage {
	return parseSvg(readSvgFile(path), options)
}

/**
 * Parse SVG from UTF-8 bytes
 *
 * @throws EmptyInputError when there are no bytes
 */
export function loadSvgBytes(bytes: Uint8Array | null | undefined, options: ParseOptions = {}): DrawingImage {
	return parseSvg(readSvgBytes(bytes), options)
}

/**
 * Read a stream to its end and parse it
 *
 * @throws EmptyInputError when the stream is missing or yields nothing
 */
export async function loadSvgStream(
	stream: AsyncIterable<Uint8Array | string> | null | undefined,
	options: ParseOptions = {}
): Promise<DrawingImage> {
	return parseSvg(await readSvgStream(stream), options)
}

/**
 * Resolve a URI and parse what it points at
 *
 * @throws InvalidDocumentError when the resolver fails or the content is not an SVG document
 * @throws EmptyInputError when the resolver returns nothing
 */
export async function loadSvgUri(uri: string, options: UriLoadOptions = {}): Promise<DrawingImage> {
	const { resolver, ...parseOptions } = options
	return parseSvg(await readSvgUri(uri, resolver), parseOptions)
}
