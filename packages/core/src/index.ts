/**
 * @svgdraw/core - Drawing tree model shared by every package
 */

export * from './types'
export * from './errors'
export * from './tree'
