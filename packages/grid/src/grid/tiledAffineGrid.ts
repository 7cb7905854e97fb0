/**
 * Tiled Affine Grid
 *
 * Tiles of an affine grid. Over the whole extent it still behaves as the
 * base affine grid (same transform, same cells); each tile is an affine
 * grid of its own whose transform starts at the tile's top-left cell.
 *
 * Tiling a transformed grid and transforming a tiled grid both end up
 * here, so the two orders give the same structure.
 */

import { scale, toAffine } from '@rastergrid/affine'
import { createGridView, delegateAffineView } from '../core/capabilities'
import { tileCount } from '../core/tiling'
import type { AffineGrid, PointInput, TiledAffineGrid } from '../core/types'
import { gridKeywords } from '../vocabulary'
import type { CellCoords, Size } from '../vocabulary'
import { createAffineTile } from './affineTile'
import { tileAddressOf } from './tile'

/**
 * Tile `baseGrid` with an already validated nominal tile size
 */
export function createTiledAffineGrid(
  baseGrid: AffineGrid,
  tileSize: Size,
): TiledAffineGrid {
  const size = Object.freeze({
    cols: tileCount(baseGrid.cols, tileSize.cols),
    rows: tileCount(baseGrid.rows, tileSize.rows),
  })

  const tiledGrid: TiledAffineGrid = {
    kind: gridKeywords.kinds.tiledAffineGrid,
    ...createGridView(size, (col, row) => createAffineTile(tiledGrid, col, row)),
    ...delegateAffineView(baseGrid),
    baseGrid,
    tileSize,
    tileGridTransform: toAffine(baseGrid.transform).compose(
      scale(tileSize.cols, tileSize.rows),
    ),
    tileAt: (col, row) => tiledGrid.cellAt(col, row),
    tileContaining: (target) => {
      const cell = isCellCoords(target) ? target : baseGrid.cellContaining(target)
      const address = tileAddressOf(baseGrid, tileSize, cell)
      return tiledGrid.cellAt(address.col, address.row)
    },
  }

  return Object.freeze(tiledGrid)
}

function isCellCoords(target: CellCoords | PointInput): target is CellCoords {
  return 'col' in target && 'row' in target
}
