/**
 * Grid
 *
 * A plain cols x rows grid of cells. Cells are created on lookup and
 * never stored.
 */

import {
  createCellView,
  createGridView,
  parseCellCoords,
  parseSize,
} from '../core/capabilities'
import { tileSizeInto, tileSizeVia } from '../core/tiling'
import type { Cell, Grid } from '../core/types'
import { gridKeywords } from '../vocabulary'
import type { CellCoords, Size } from '../vocabulary'
import { createAffineGrid } from './affineGrid'
import { createTiledGrid } from './tiledGrid'

/**
 * Create a grid from a size or from a column and row count
 */
export function createGrid(size: Size): Grid
export function createGrid(cols: number, rows: number): Grid
export function createGrid(sizeOrCols: Size | number, rows?: number): Grid {
  const size = parseSize(
    typeof sizeOrCols === 'number'
      ? { cols: sizeOrCols, rows: rows ?? Number.NaN }
      : sizeOrCols,
  )

  const grid: Grid = {
    kind: gridKeywords.kinds.grid,
    ...createGridView(size, (col, row) => createCell(grid, col, row)),
    tile: (by) => grid.tileVia(by),
    tileVia: (by) => createTiledGrid(grid, tileSizeVia(size, by)),
    tileInto: (by) => createTiledGrid(grid, tileSizeInto(size, by)),
    addTransform: (transform) => createAffineGrid(size, transform),
  }

  return Object.freeze(grid)
}

function createCell(grid: Grid, col: number, row: number): Cell {
  const cell: Cell = {
    kind: gridKeywords.kinds.cell,
    ...createCellView(col, row, grid),
    grid,
  }

  return Object.freeze(cell)
}

/**
 * A validated cell address with no grid attached
 */
export function cellCoords(col: number, row: number): CellCoords {
  return parseCellCoords(col, row)
}
