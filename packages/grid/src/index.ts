/**
 * @rastergrid/grid
 *
 * Rectangular grids, tilings of grids, and the mapping between grid
 * cells and model space through an affine transform.
 *
 * @example
 * ```ts
 * import { createGrid } from '@rastergrid/grid'
 *
 * const grid = createGrid(10000, 5000).addTransform([10, 0, 200000, 0, -10, 6100000])
 * const tiles = grid.tileVia({ cols: 1024, rows: 1024 })
 *
 * const tile = tiles.tileContaining({ x: 250000, y: 6080000 })
 * tile.cellAt(0, 0).origin // same point as grid.originOf(tile.offset)
 * ```
 */

// ============================================================================
// Vocabulary - keywords and schemas
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Core - types, errors, points, tiling arithmetic
// ============================================================================

export * from './core'

// ============================================================================
// Grids
// ============================================================================

export * from './grid'
