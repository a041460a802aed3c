/**
 * @svgdraw/color - Paint values and opacity
 */

export { hslToRgb } from './convert'
export { namedColorNames, resolveCssColor } from './css'
export {
	applyOpacityToBrush,
	applyOpacityToColor,
	colorOpacity,
	isTransparentBrush,
	sameRgb,
} from './opacity'
export { BLACK, parseBrush, parseColor, solidBrush, TRANSPARENT, tryParseColor } from './parse'
