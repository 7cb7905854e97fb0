/**
 * Grid - Core Types
 *
 * Every grid, tile and cell is assembled from a few capability types
 * rather than a class hierarchy:
 *
 * - CellView: a (col, row) address inside a parent
 * - GridView: a cols x rows shape with indexed cell lookup
 * - Tileable / Transformable: the two ways of deriving a new grid
 * - AffineView: the mapping between grid space and model space
 * - Footprint: a cell's corners in model space
 *
 * A Tile is a CellView and a GridView at once; an AffineTile adds
 * AffineView and Footprint on top. All values are frozen.
 *
 * Index order is always (col, row), matching (x, y).
 */

import type { Affine, AffineCoefficients, AffineTransform } from '@rastergrid/affine'
import type { Point as GeoJSONPoint } from 'geojson'
import type { gridKeywords } from '../vocabulary'
import type { CellCoords, Size, XY } from '../vocabulary'

type Kinds = typeof gridKeywords.kinds

// ============================================================================
// Points
// ============================================================================

/**
 * Anything that can hand out a GeoJSON Point geometry
 */
export type GeoInterface = {
  toGeoJSON: () => GeoJSONPoint
}

/**
 * Accepted wherever a point is expected
 */
export type PointInput = XY | GeoJSONPoint | GeoInterface

/**
 * Immutable model-space coordinate
 */
export type Point = XY &
  GeoInterface & {
    readonly kind: Kinds['point']
    equals: (other: XY) => boolean
    toArray: () => [number, number]
  }

/**
 * Axis-aligned extent in model space
 */
export type Bounds = {
  readonly minX: number
  readonly minY: number
  readonly maxX: number
  readonly maxY: number
}

// ============================================================================
// Capabilities
// ============================================================================

export type CellView = CellCoords & {
  /** Row-major index of the cell within its parent */
  readonly linearIndex: number
  equals: (other: CellCoords) => boolean
}

export type GridView<TCell> = Size & {
  readonly size: Size
  readonly count: number
  contains: (col: number, row: number) => boolean

  /** Throws OutOfBoundsError outside [0, cols) x [0, rows) */
  cellAt: (col: number, row: number) => TCell

  /** Like cellAt, but negative indexes count back from the far edge */
  at: (col: number, row: number) => TCell

  /** Every cell, row by row */
  cells: () => IterableIterator<TCell>
}

export type Tileable<TTiled> = {
  /** Alias of tileVia */
  tile: (by: Size) => TTiled

  /** Partition into tiles of nominal size `by` */
  tileVia: (by: Size) => TTiled

  /** Partition into a tile grid shaped `by` */
  tileInto: (by: Size) => TTiled
}

export type TransformInput = AffineTransform | AffineCoefficients

export type Transformable<TResult> = {
  addTransform: (transform: TransformInput) => TResult
}

export type AffineView<TCell> = {
  readonly transform: AffineTransform
  readonly bounds: Bounds

  /** Fractional grid coordinates to model space */
  toModel: (col: number, row: number) => Point

  /** Model space to fractional grid coordinates */
  toGrid: (point: PointInput) => [number, number]

  originOf: (cell: CellCoords) => Point
  centroidOf: (cell: CellCoords) => Point
  antioriginOf: (cell: CellCoords) => Point

  /**
   * Cell whose half-open footprint [col, col + 1) x [row, row + 1)
   * holds the point. Throws OutOfBoundsError off the grid.
   */
  cellContaining: (point: PointInput) => TCell
}

export type Footprint = {
  readonly origin: Point
  readonly centroid: Point
  readonly antiorigin: Point

  /** Origin, top-right, antiorigin, bottom-left */
  readonly corners: ReadonlyArray<Point>
}

// ============================================================================
// Cells
// ============================================================================

export type Cell = CellView & {
  readonly kind: Kinds['cell']
  readonly grid: Grid
}

export type AffineCell = CellView &
  Footprint & {
    readonly kind: Kinds['affineCell']
    readonly grid: AffineGrid
  }

type TileCellView<TTile, TGlobal> = CellView & {
  readonly tile: TTile

  /** Position in the base grid */
  readonly globalCol: number
  readonly globalRow: number

  toGlobal: () => TGlobal
}

export type TileCell = TileCellView<Tile, Cell> & {
  readonly kind: Kinds['tileCell']
}

export type AffineTileCell = TileCellView<AffineTile, AffineCell> &
  Footprint & {
    readonly kind: Kinds['affineTileCell']
  }

// ============================================================================
// Grids
// ============================================================================

export type Grid = GridView<Cell> &
  Tileable<TiledGrid> &
  Transformable<AffineGrid> & {
    readonly kind: Kinds['grid']
  }

export type AffineGrid = GridView<AffineCell> &
  AffineView<AffineCell> &
  Tileable<TiledAffineGrid> & {
    readonly kind: Kinds['affineGrid']
  }

// ============================================================================
// Tiles
// ============================================================================

type TileView<TTiled, TCell> = CellView &
  GridView<TCell> & {
    readonly tiledGrid: TTiled

    /** Requested tile size; edge tiles may be smaller */
    readonly nominalSize: Size

    /** Base-grid address of the tile's top-left cell */
    readonly offset: CellCoords

    /** Truncated by the far edge of the base grid */
    readonly isEdge: boolean
  }

export type Tile = TileView<TiledGrid, TileCell> & {
  readonly kind: Kinds['tile']
}

export type AffineTile = TileView<TiledAffineGrid, AffineTileCell> &
  AffineView<AffineTileCell> &
  Footprint & {
    readonly kind: Kinds['affineTile']

    /**
     * Parent transform moved to the tile's offset. Lookups on the tile
     * use the parent transform at global coordinates instead.
     */
    readonly transform: Affine
  }

// ============================================================================
// Tiled grids
// ============================================================================

type TiledView<TBase, TTile> = GridView<TTile> & {
  readonly baseGrid: TBase

  /** Nominal tile size */
  readonly tileSize: Size

  tileAt: (col: number, row: number) => TTile
}

export type TiledGrid = TiledView<Grid, Tile> &
  Transformable<TiledAffineGrid> & {
    readonly kind: Kinds['tiledGrid']

    /**
     * Tile cells are placed by their global position. Throws
     * OutOfBoundsError when the cell is off the base grid.
     */
    tileContaining: (cell: CellCoords) => Tile
  }

export type TiledAffineGrid = TiledView<AffineGrid, AffineTile> &
  AffineView<AffineCell> & {
    readonly kind: Kinds['tiledAffineGrid']

    /** Transform over tile-grid space: one unit is one nominal tile */
    readonly tileGridTransform: Affine

    /** Resolves a point to its base cell first */
    tileContaining: (target: CellCoords | PointInput) => AffineTile
  }
