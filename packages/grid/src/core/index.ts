/**
 * Core Module
 *
 * Types, errors, points and the tiling arithmetic shared by every grid.
 */

// Errors
export {
  ConfigurationError,
  GridError,
  InvalidCoordinateError,
  InvalidGridError,
  InvalidTilingError,
  OutOfBoundsError,
} from './errors'

// Points
export { createPoint, fromGeoJSON, isPoint, midpoint, toPoint } from './point'

// Tiling arithmetic
export {
  canTileInto,
  edgeTileSize,
  tileCount,
  tileExtent,
  tileIndexOf,
  tileOffset,
  tileSizeInto,
  tileSizeVia,
} from './tiling'

// Types
export type {
  AffineCell,
  AffineGrid,
  AffineTile,
  AffineTileCell,
  AffineView,
  Bounds,
  Cell,
  CellView,
  Footprint,
  GeoInterface,
  Grid,
  GridView,
  Point,
  PointInput,
  Tile,
  TileCell,
  Tileable,
  TiledAffineGrid,
  TiledGrid,
  Transformable,
  TransformInput,
} from './types'
