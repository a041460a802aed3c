/**
 * @svgdraw/transform - Affine transforms and the transform grammar
 */

export {
	composeTransforms,
	IDENTITY,
	IDENTITY_MATRIX,
	isIdentity,
	isIdentityMatrix,
	multiply,
	toMatrix,
	transformPoint,
} from './matrix'
export { parseTransform } from './parse'
