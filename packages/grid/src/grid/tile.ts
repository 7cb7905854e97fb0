/**
 * Tiles
 *
 * A tile is a cell of a tiled grid and a grid of its own at the same
 * time: `col`/`row` place it in the tile grid, `cols`/`rows` give its
 * actual size. Tiles in the last tile column or row are truncated to
 * whatever the base grid has left.
 */

import { createCellView, createGridView } from '../core/capabilities'
import { OutOfBoundsError } from '../core/errors'
import { tileExtent, tileIndexOf, tileOffset } from '../core/tiling'
import type { Tile, TileCell, TiledGrid } from '../core/types'
import { gridKeywords } from '../vocabulary'
import type { CellCoords, Size } from '../vocabulary'

type TileFrame = {
  offset: CellCoords
  size: Size
  isEdge: boolean
}

/**
 * Offset and actual size of the tile at (col, row)
 */
export function tileFrame(
  base: Size,
  tileSize: Size,
  col: number,
  row: number,
): TileFrame {
  const offset = tileOffset({ col, row }, tileSize)
  const size = Object.freeze({
    cols: tileExtent(base.cols, tileSize.cols, col),
    rows: tileExtent(base.rows, tileSize.rows, row),
  })

  return {
    offset,
    size,
    isEdge: size.cols < tileSize.cols || size.rows < tileSize.rows,
  }
}

/**
 * Base-grid address of a cell; tile cells resolve through their global
 * position rather than their tile-local col and row
 */
export function baseCellOf(cell: CellCoords): CellCoords {
  if (
    'globalCol' in cell &&
    'globalRow' in cell &&
    typeof cell.globalCol === 'number' &&
    typeof cell.globalRow === 'number'
  ) {
    return { col: cell.globalCol, row: cell.globalRow }
  }

  return cell
}

/**
 * Tile-grid address of the tile holding a base-grid cell
 */
export function tileAddressOf(
  base: { contains: (col: number, row: number) => boolean },
  tileSize: Size,
  target: CellCoords,
): CellCoords {
  const cell = baseCellOf(target)

  if (!base.contains(cell.col, cell.row)) {
    throw new OutOfBoundsError(`cell (${cell.col}, ${cell.row}) outside grid`, {
      col: cell.col,
      row: cell.row,
    })
  }

  return {
    col: tileIndexOf(cell.col, tileSize.cols),
    row: tileIndexOf(cell.row, tileSize.rows),
  }
}

export function createTile(tiledGrid: TiledGrid, col: number, row: number): Tile {
  const { offset, size, isEdge } = tileFrame(
    tiledGrid.baseGrid,
    tiledGrid.tileSize,
    col,
    row,
  )

  const tile: Tile = {
    kind: gridKeywords.kinds.tile,
    ...createCellView(col, row, tiledGrid),
    ...createGridView(size, (localCol, localRow) =>
      createTileCell(tile, localCol, localRow),
    ),
    tiledGrid,
    nominalSize: tiledGrid.tileSize,
    offset,
    isEdge,
  }

  return Object.freeze(tile)
}

function createTileCell(tile: Tile, col: number, row: number): TileCell {
  const globalCol = tile.offset.col + col
  const globalRow = tile.offset.row + row

  const cell: TileCell = {
    kind: gridKeywords.kinds.tileCell,
    ...createCellView(col, row, tile),
    tile,
    globalCol,
    globalRow,
    toGlobal: () => tile.tiledGrid.baseGrid.cellAt(globalCol, globalRow),
  }

  return Object.freeze(cell)
}
