/**
 * Tiled Grid
 *
 * A grid whose cells are tiles of a base grid.
 */

import { createGridView } from '../core/capabilities'
import { tileCount } from '../core/tiling'
import type { Grid, TiledGrid } from '../core/types'
import { gridKeywords } from '../vocabulary'
import type { Size } from '../vocabulary'
import { createTile, tileAddressOf } from './tile'
import { createTiledAffineGrid } from './tiledAffineGrid'

/**
 * Tile `baseGrid` with an already validated nominal tile size
 */
export function createTiledGrid(baseGrid: Grid, tileSize: Size): TiledGrid {
  const size = Object.freeze({
    cols: tileCount(baseGrid.cols, tileSize.cols),
    rows: tileCount(baseGrid.rows, tileSize.rows),
  })

  const tiledGrid: TiledGrid = {
    kind: gridKeywords.kinds.tiledGrid,
    ...createGridView(size, (col, row) => createTile(tiledGrid, col, row)),
    baseGrid,
    tileSize,
    tileAt: (col, row) => tiledGrid.cellAt(col, row),
    tileContaining: (cell) => {
      const address = tileAddressOf(baseGrid, tileSize, cell)
      return tiledGrid.cellAt(address.col, address.row)
    },
    // Same structure as transforming first and tiling second
    addTransform: (transform) =>
      createTiledAffineGrid(baseGrid.addTransform(transform), tileSize),
  }

  return Object.freeze(tiledGrid)
}
