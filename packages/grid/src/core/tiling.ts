/**
 * Grid - Tiling Arithmetic
 *
 * Pure functions that partition one dimension of a grid into tiles.
 * Tiles start at multiples of the nominal tile size; the last tile in a
 * dimension takes whatever is left.
 */

import type { CellCoords, Size } from '../vocabulary'
import { InvalidTilingError } from './errors'
import { parseSize } from './capabilities'

/**
 * Number of tiles needed to cover `gridSize` cells
 */
export function tileCount(gridSize: number, tileSize: number): number {
  return Math.ceil(gridSize / tileSize)
}

/**
 * Actual extent of the tile at `index`
 */
export function tileExtent(gridSize: number, tileSize: number, index: number): number {
  return Math.min(tileSize, gridSize - index * tileSize)
}

/**
 * Extent of the last tile: the remainder, or a full tile when there is none
 */
export function edgeTileSize(gridSize: number, tileSize: number): number {
  const remainder = gridSize % tileSize
  return remainder === 0 ? tileSize : remainder
}

/**
 * Whether `gridSize` cells split into exactly `count` tiles of equal
 * nominal size (the last one possibly shorter)
 */
export function canTileInto(gridSize: number, count: number): boolean {
  return count === Math.ceil(gridSize / Math.ceil(gridSize / count))
}

/**
 * Index of the tile holding `index` along one dimension
 */
export function tileIndexOf(index: number, tileSize: number): number {
  return Math.floor(index / tileSize)
}

/**
 * Base-grid offset of a tile's top-left cell
 */
export function tileOffset(tile: CellCoords, tileSize: Size): CellCoords {
  return Object.freeze({
    col: tile.col * tileSize.cols,
    row: tile.row * tileSize.rows,
  })
}

/**
 * Nominal tile size for tiles of size `by`.
 *
 * Tiles larger than the grid in either dimension are rejected.
 */
export function tileSizeVia(grid: Size, by: Size): Size {
  const tileSize = parseSize(by, 'tile')

  if (tileSize.cols > grid.cols || tileSize.rows > grid.rows) {
    throw new InvalidTilingError(
      `Cannot tile grid of size ${grid.cols}x${grid.rows} with tiles of size ${tileSize.cols}x${tileSize.rows}`,
      { grid: { cols: grid.cols, rows: grid.rows }, tileSize },
    )
  }

  return tileSize
}

/**
 * Nominal tile size that splits the grid into a tile grid shaped `by`.
 */
export function tileSizeInto(grid: Size, by: Size): Size {
  const tileGrid = parseSize(by, 'tile grid')

  if (!(canTileInto(grid.cols, tileGrid.cols) && canTileInto(grid.rows, tileGrid.rows))) {
    throw new InvalidTilingError(
      `Cannot tile grid of size ${grid.cols}x${grid.rows} into ${tileGrid.cols}x${tileGrid.rows} tiles`,
      { grid: { cols: grid.cols, rows: grid.rows }, tileGrid },
    )
  }

  return Object.freeze({
    cols: Math.ceil(grid.cols / tileGrid.cols),
    rows: Math.ceil(grid.rows / tileGrid.rows),
  })
}
