/**
 * Points
 *
 * Immutable model-space coordinates and the point interchange view.
 *
 * Every Point hands out a GeoJSON Point geometry through toGeoJSON(), and
 * every boundary that takes a point also accepts a plain { x, y }, a
 * GeoJSON Point geometry, or any object with toGeoJSON(). Geometry
 * libraries can talk to grids without this package depending on them.
 */

import type { Point as GeoJSONPoint } from 'geojson'
import { geoJsonPointSchema, gridKeywords, xySchema } from '../vocabulary'
import type { XY } from '../vocabulary'
import { InvalidCoordinateError } from './errors'
import type { Point, PointInput } from './types'

/**
 * Create a point
 */
export function createPoint(x: number, y: number): Point {
  const parsed = xySchema.safeParse({ x, y })
  if (!parsed.success) {
    throw new InvalidCoordinateError('Point coordinates must be finite numbers', {
      x,
      y,
    })
  }

  const point: Point = {
    kind: gridKeywords.kinds.point,
    x,
    y,
    equals: (other) => x === other.x && y === other.y,
    toArray: () => [x, y],
    toGeoJSON: () => ({ type: 'Point', coordinates: [x, y] }),
  }

  return Object.freeze(point)
}

/**
 * Read a point from a GeoJSON Point geometry
 */
export function fromGeoJSON(geometry: GeoJSONPoint): Point {
  const parsed = geoJsonPointSchema.safeParse(geometry)
  if (!parsed.success) {
    throw new InvalidCoordinateError('Expected a GeoJSON Point with finite x and y', {
      issues: parsed.error.issues,
    })
  }

  const [x, y, ...extra] = parsed.data.coordinates
  if (extra.length > 0) {
    console.warn(`${gridKeywords.logTag} Ignoring extra point coordinates:`, extra)
  }

  return createPoint(x, y)
}

/**
 * Check whether a value is a Point built by createPoint
 */
export function isPoint(value: object): value is Point {
  return 'kind' in value && value.kind === gridKeywords.kinds.point
}

/**
 * Normalize any accepted point input to a Point
 */
export function toPoint(input: PointInput): Point {
  if (isPoint(input)) return input
  if ('toGeoJSON' in input) return fromGeoJSON(input.toGeoJSON())
  if ('type' in input) return fromGeoJSON(input)
  return createPoint(input.x, input.y)
}

/**
 * Midpoint of two points
 */
export function midpoint(a: XY, b: XY): Point {
  return createPoint((a.x + b.x) / 2, (a.y + b.y) / 2)
}
