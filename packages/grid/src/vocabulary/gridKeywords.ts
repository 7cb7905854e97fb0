/**
 * Grid Keywords
 *
 * Single source of truth for grid-related constants.
 *
 * Philosophy:
 * - No magic strings anywhere in the codebase
 * - Every `kind` discriminator and error code lives here
 */

export const gridKeywords = {
  /**
   * Object kinds (discriminators on every value the package builds)
   */
  kinds: {
    point: 'point',
    cell: 'cell',
    grid: 'grid',
    tile: 'tile',
    tileCell: 'tileCell',
    tiledGrid: 'tiledGrid',
    affineCell: 'affineCell',
    affineGrid: 'affineGrid',
    affineTile: 'affineTile',
    affineTileCell: 'affineTileCell',
    tiledAffineGrid: 'tiledAffineGrid',
  },

  /**
   * Error codes carried by GridError subclasses
   */
  errors: {
    outOfBounds: 'OUT_OF_BOUNDS',
    invalidGrid: 'INVALID_GRID',
    invalidTiling: 'INVALID_TILING',
    invalidCoordinate: 'INVALID_COORDINATE',
  },

  /**
   * Named positions within a cell footprint, as offsets from the cell's
   * top-left corner in grid units
   */
  cellPositions: {
    origin: 0,
    centroid: 0.5,
    antiorigin: 1,
  },

  /**
   * Tag prepended to console output
   */
  logTag: '[rastergrid]',
} as const

// ============================================================================
// Type Exports
// ============================================================================

export type GridKind = (typeof gridKeywords.kinds)[keyof typeof gridKeywords.kinds]

export type GridErrorCode =
  (typeof gridKeywords.errors)[keyof typeof gridKeywords.errors]

export type CellPosition = keyof typeof gridKeywords.cellPositions
