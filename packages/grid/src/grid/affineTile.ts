/**
 * Affine Tiles
 *
 * A tile of a tiled affine grid, and an affine grid in its own right.
 *
 * The tile's `transform` is the parent transform with its translation
 * moved to the tile's offset. Lookups and footprints still go through the
 * parent transform at the global cell, so every point a tile hands out is
 * bit-for-bit the point the parent grid gives for the same cell.
 */

import {
  createAffineView,
  createCellView,
  createFootprint,
  createGridView,
  offsetTransform,
} from '../core/capabilities'
import type { AffineTile, AffineTileCell, TiledAffineGrid } from '../core/types'
import { gridKeywords } from '../vocabulary'
import { tileFrame } from './tile'

export function createAffineTile(
  tiledGrid: TiledAffineGrid,
  col: number,
  row: number,
): AffineTile {
  const { offset, size, isEdge } = tileFrame(
    tiledGrid.baseGrid,
    tiledGrid.tileSize,
    col,
    row,
  )
  const parentTransform = tiledGrid.transform
  const transform = offsetTransform(parentTransform, offset.col, offset.row)

  const view = createGridView(size, (localCol, localRow) =>
    createAffineTileCell(tile, localCol, localRow),
  )

  const tile: AffineTile = {
    kind: gridKeywords.kinds.affineTile,
    ...createCellView(col, row, tiledGrid),
    ...view,
    ...createAffineView(parentTransform, view, offset),
    // The tile's own footprint as a cell of the tile grid
    ...createFootprint(parentTransform, offset.col, offset.row, size),
    transform,
    tiledGrid,
    nominalSize: tiledGrid.tileSize,
    offset,
    isEdge,
  }

  return Object.freeze(tile)
}

function createAffineTileCell(
  tile: AffineTile,
  col: number,
  row: number,
): AffineTileCell {
  const globalCol = tile.offset.col + col
  const globalRow = tile.offset.row + row

  const cell: AffineTileCell = {
    kind: gridKeywords.kinds.affineTileCell,
    ...createCellView(col, row, tile),
    ...createFootprint(tile.tiledGrid.transform, globalCol, globalRow),
    tile,
    globalCol,
    globalRow,
    toGlobal: () => tile.tiledGrid.baseGrid.cellAt(globalCol, globalRow),
  }

  return Object.freeze(cell)
}
