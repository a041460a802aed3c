/**
 * @svgdraw/svg - SVG documents to drawing trees
 */

export type { ElementContext, InheritedGroupState, PaintOptions, ResolvedPaint } from './cascade'
export {
	createElementContext,
	deriveGroupState,
	resolveFill,
	resolveFillRule,
	resolvePaint,
	resolveStroke,
	ROOT_GROUP_STATE,
} from './cascade'
export { parseDocument, parseSvg, populateDefinitions } from './document'
export { replaceFillBrush, replaceStrokeBrush } from './edit'
export { convertGradient, convertLinearGradient, convertRadialGradient, parseStop } from './gradient'
export { SvgImage } from './image'
export type { UriLoadOptions, UriResolver } from './load'
export {
	loadSvgBytes,
	loadSvgFile,
	loadSvgStream,
	loadSvgUri,
	readSvgBytes,
	readSvgFile,
	readSvgStream,
	readSvgUri,
	resolveUri,
} from './load'
export type { ParseOptions, ResolvedParseOptions } from './options'
export { resolveOptions } from './options'
export type { PathDataResult } from './path-data'
export { parsePathData } from './path-data'
export type { Artifact, ArtifactKind, ArtifactValue } from './registry'
export { DefinitionsRegistry } from './registry'
export type { ShapeConverter } from './shapes'
export { convertShape } from './shapes'
export type { ElementStyle, StyleContext, StyleKey, StyleMap } from './style'
export { parsePaint, parseStyle, pick, readElementStyle } from './style'
export { convertText } from './text'
export type { XmlElement } from './xml'
export { readXml } from './xml'
