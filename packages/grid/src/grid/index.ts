/**
 * Grid Module
 *
 * Factories for grids, tiled grids and their affine counterparts.
 */

export { cellCoords, createGrid } from './grid'
export { createAffineGrid } from './affineGrid'
