/**
 * Grid - Capabilities
 *
 * Building blocks that grids, tiles and cells are composed from.
 *
 * Responsibilities:
 * - Size and cell-address validation
 * - Bounds-checked, lazily created cell lookup (GridView)
 * - Cell addressing inside a parent (CellView)
 * - Grid space to model space mapping (AffineView, Footprint)
 */

import { toAffine } from '@rastergrid/affine'
import type { Affine, AffineTransform } from '@rastergrid/affine'
import { cellCoordsSchema, gridKeywords, sizeSchema } from '../vocabulary'
import type { CellCoords, CellPosition, Size } from '../vocabulary'
import {
  InvalidCoordinateError,
  InvalidGridError,
  OutOfBoundsError,
} from './errors'
import { createPoint, toPoint } from './point'
import type {
  AffineView,
  Bounds,
  CellView,
  Footprint,
  GridView,
  Point,
  PointInput,
  TransformInput,
} from './types'

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a size and return a plain frozen copy
 */
export function parseSize(size: Size, label: string = 'grid'): Size {
  const parsed = sizeSchema.safeParse(size)
  if (!parsed.success) {
    throw new InvalidGridError(
      `${label} cols and rows must be whole numbers of 1 or greater`,
      { cols: size.cols, rows: size.rows, issues: parsed.error.issues },
    )
  }

  return Object.freeze({ cols: parsed.data.cols, rows: parsed.data.rows })
}

/**
 * Validate a stand-alone cell address
 */
export function parseCellCoords(col: number, row: number): CellCoords {
  const parsed = cellCoordsSchema.safeParse({ col, row })
  if (!parsed.success) {
    throw new InvalidCoordinateError(
      'cell col and row must be whole numbers of 0 or greater',
      { col, row, issues: parsed.error.issues },
    )
  }

  return Object.freeze({ col: parsed.data.col, row: parsed.data.row })
}

/**
 * Normalize a caller-supplied transform
 */
export function parseTransform(transform: TransformInput): AffineTransform {
  return 'forward' in transform ? transform : toAffine(transform)
}

/**
 * Floor a fractional grid coordinate to a cell index, first snapping it
 * to the nearest whole number when it lies within `tolerance` of one.
 * `+ 0` folds -0 into 0 and keeps NaN.
 */
export function floorIndex(value: number, tolerance: number = 0): number {
  const nearest = Math.round(value)
  const snapped = Math.abs(value - nearest) <= tolerance ? nearest : value
  return Math.floor(snapped) + 0
}

const roundingSlack = 16 * Number.EPSILON

/**
 * Rounding error bound, in cells, of `transform.inverse(x, y)` landing
 * at (col, row). Forward and inverse each round at the magnitude of the
 * model coordinates, which can be far larger than one cell.
 */
export function inverseTolerance(
  transform: AffineTransform,
  x: number,
  y: number,
  col: number,
  row: number,
): [number, number] {
  const { a, b, c, d, e, f } = transform
  const determinant = Math.abs(a * e - b * d)
  const spanX = Math.abs(x) + Math.abs(c)
  const spanY = Math.abs(y) + Math.abs(f)

  return [
    roundingSlack * ((Math.abs(e) * spanX + Math.abs(b) * spanY) / determinant + Math.abs(col)),
    roundingSlack * ((Math.abs(d) * spanX + Math.abs(a) * spanY) / determinant + Math.abs(row)),
  ]
}

// ============================================================================
// Cell View
// ============================================================================

export function createCellView(
  col: number,
  row: number,
  parent: Size,
): CellView {
  return {
    col,
    row,
    linearIndex: row * parent.cols + col,
    equals: (other) => other.col === col && other.row === row,
  }
}

// ============================================================================
// Grid View
// ============================================================================

/**
 * Indexed lookup over a cols x rows shape.
 *
 * Nothing is stored: `createCell` runs on every lookup.
 */
export function createGridView<TCell>(
  size: Size,
  createCell: (col: number, row: number) => TCell,
): GridView<TCell> {
  const { cols, rows } = size

  const contains = (col: number, row: number): boolean =>
    Number.isInteger(col) &&
    Number.isInteger(row) &&
    col >= 0 &&
    col < cols &&
    row >= 0 &&
    row < rows

  const cellAt = (col: number, row: number): TCell => {
    if (!Number.isInteger(col) || !Number.isInteger(row)) {
      throw new InvalidCoordinateError('cell col and row must be whole numbers', {
        col,
        row,
      })
    }

    if (col < 0 || col >= cols) {
      throw new OutOfBoundsError(`column ${col} outside grid of ${cols} columns`, {
        col,
        row,
        cols,
        rows,
      })
    }

    if (row < 0 || row >= rows) {
      throw new OutOfBoundsError(`row ${row} outside grid of ${rows} rows`, {
        col,
        row,
        cols,
        rows,
      })
    }

    return createCell(col, row)
  }

  function* cells(): IterableIterator<TCell> {
    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) {
        yield createCell(col, row)
      }
    }
  }

  return {
    cols,
    rows,
    size,
    count: cols * rows,
    contains,
    cellAt,
    at: (col, row) => cellAt(col < 0 ? col + cols : col, row < 0 ? row + rows : row),
    cells,
  }
}

// ============================================================================
// Affine View
// ============================================================================

/**
 * Model-space point at a named position of the cell at (col, row)
 */
export function cellPoint(
  transform: AffineTransform,
  col: number,
  row: number,
  position: CellPosition,
): Point {
  const offset = gridKeywords.cellPositions[position]
  const [x, y] = transform.forward(col + offset, row + offset)
  return createPoint(x, y)
}

/**
 * Corners and centroid of the rectangle [col, col + cols) x [row, row + rows)
 */
export function createFootprint(
  transform: AffineTransform,
  col: number,
  row: number,
  size: Size = { cols: 1, rows: 1 },
): Footprint {
  const at = (c: number, r: number): Point => {
    const [x, y] = transform.forward(c, r)
    return createPoint(x, y)
  }

  const origin = at(col, row)
  const antiorigin = at(col + size.cols, row + size.rows)

  return {
    origin,
    centroid: at(col + size.cols / 2, row + size.rows / 2),
    antiorigin,
    corners: Object.freeze([
      origin,
      at(col + size.cols, row),
      antiorigin,
      at(col, row + size.rows),
    ]),
  }
}

/**
 * Model-space extent of the rectangle [col, col + cols) x [row, row + rows).
 *
 * Works on raw numbers: an extent that overflows holds Infinity rather
 * than failing point validation.
 */
export function extentBounds(
  transform: AffineTransform,
  col: number,
  row: number,
  size: Size,
): Bounds {
  const corners = [
    transform.forward(col, row),
    transform.forward(col + size.cols, row),
    transform.forward(col + size.cols, row + size.rows),
    transform.forward(col, row + size.rows),
  ]
  const xs = corners.map(([x]) => x)
  const ys = corners.map(([, y]) => y)

  return Object.freeze({
    minX: Math.min(...xs),
    minY: Math.min(...ys),
    maxX: Math.max(...xs),
    maxY: Math.max(...ys),
  })
}

/**
 * Grid space to model space mapping over a GridView.
 *
 * `offset` places the view inside a larger grid mapped by `transform`:
 * local (col, row) is mapped as (col + offset.col, row + offset.row), so a
 * sub-grid computes exactly what its parent computes for the same cell.
 */
export function createAffineView<TCell>(
  transform: AffineTransform,
  view: GridView<TCell>,
  offset: CellCoords = { col: 0, row: 0 },
): AffineView<TCell> {
  const toGrid = (point: PointInput): [number, number] => {
    const { x, y } = toPoint(point)
    const [col, row] = transform.inverse(x, y)
    return [col - offset.col, row - offset.row]
  }

  const pointOf = (position: CellPosition) => (cell: CellCoords): Point => {
    // Bounds check only; the cell itself is not needed
    view.cellAt(cell.col, cell.row)
    return cellPoint(transform, cell.col + offset.col, cell.row + offset.row, position)
  }

  return {
    transform,
    bounds: extentBounds(transform, offset.col, offset.row, view.size),
    toModel: (col, row) => {
      const [x, y] = transform.forward(col + offset.col, row + offset.row)
      return createPoint(x, y)
    },
    toGrid,
    originOf: pointOf('origin'),
    centroidOf: pointOf('centroid'),
    antioriginOf: pointOf('antiorigin'),
    cellContaining: (point) => {
      const { x, y } = toPoint(point)
      const [col, row] = transform.inverse(x, y)
      const [colTolerance, rowTolerance] = inverseTolerance(transform, x, y, col, row)

      // Resolved in the outermost grid space, then shifted into this view
      const cellCol = floorIndex(col, colTolerance) - offset.col
      const cellRow = floorIndex(row, rowTolerance) - offset.row

      if (!view.contains(cellCol, cellRow)) {
        throw new OutOfBoundsError(`point (${x}, ${y}) outside grid footprint`, {
          x,
          y,
          col: cellCol,
          row: cellRow,
        })
      }

      return view.cellAt(cellCol, cellRow)
    },
  }
}

/**
 * Derive a sub-grid's transform: same linear part, origin moved to
 * (col, row) of the parent grid
 */
export function offsetTransform(
  transform: AffineTransform,
  col: number,
  row: number,
): Affine {
  return toAffine(transform).translate(col, row)
}

/**
 * Re-expose another object's affine capabilities
 */
export function delegateAffineView<TCell>(source: AffineView<TCell>): AffineView<TCell> {
  return {
    transform: source.transform,
    bounds: source.bounds,
    toModel: source.toModel,
    toGrid: source.toGrid,
    originOf: source.originOf,
    centroidOf: source.centroidOf,
    antioriginOf: source.antioriginOf,
    cellContaining: source.cellContaining,
  }
}
