/**
 * Affine Grid
 *
 * A grid placed in model space by an affine transform.
 *
 * Responsibilities:
 * - Cells that know their origin, centroid and antiorigin
 * - Point to cell lookup through the inverse transform
 * - Tiling into tiles that carry their own derived transforms
 */

import {
  createAffineView,
  createCellView,
  createFootprint,
  createGridView,
  parseSize,
  parseTransform,
} from '../core/capabilities'
import { tileSizeInto, tileSizeVia } from '../core/tiling'
import type { AffineCell, AffineGrid, TransformInput } from '../core/types'
import { gridKeywords } from '../vocabulary'
import type { Size } from '../vocabulary'
import { createTiledAffineGrid } from './tiledAffineGrid'

/**
 * Create a grid of `size` mapped to model space by `transform`.
 *
 * The transform is kept as supplied; its invertibility is only checked
 * when a point has to be mapped back to the grid.
 */
export function createAffineGrid(size: Size, transform: TransformInput): AffineGrid {
  const gridSize = parseSize(size)
  const affine = parseTransform(transform)

  const view = createGridView(gridSize, (col, row) =>
    createAffineCell(affineGrid, col, row),
  )

  const affineGrid: AffineGrid = {
    kind: gridKeywords.kinds.affineGrid,
    ...view,
    ...createAffineView(affine, view),
    tile: (by) => affineGrid.tileVia(by),
    tileVia: (by) => createTiledAffineGrid(affineGrid, tileSizeVia(gridSize, by)),
    tileInto: (by) => createTiledAffineGrid(affineGrid, tileSizeInto(gridSize, by)),
  }

  return Object.freeze(affineGrid)
}

function createAffineCell(grid: AffineGrid, col: number, row: number): AffineCell {
  const cell: AffineCell = {
    kind: gridKeywords.kinds.affineCell,
    ...createCellView(col, row, grid),
    ...createFootprint(grid.transform, col, row),
    grid,
  }

  return Object.freeze(cell)
}
