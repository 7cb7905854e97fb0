/**
 * Grid Schemas
 *
 * Zod schemas for every value a caller hands to the grid factories.
 * Types are inferred from the schemas and made readonly.
 */

import { z } from 'zod'

/**
 * Grid or tile size: whole numbers of columns and rows, at least 1 each
 */
export const sizeSchema = z.object({
  cols: z.number().int().min(1),
  rows: z.number().int().min(1),
})

export type Size = Readonly<z.infer<typeof sizeSchema>>

/**
 * Cell address: non-negative whole column and row
 */
export const cellCoordsSchema = z.object({
  col: z.number().int().min(0),
  row: z.number().int().min(0),
})

export type CellCoords = Readonly<z.infer<typeof cellCoordsSchema>>

/**
 * Model-space coordinate pair
 */
export const xySchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
})

export type XY = Readonly<z.infer<typeof xySchema>>

/**
 * GeoJSON Point geometry (the point interchange view).
 *
 * Only the first two positions are read.
 */
export const geoJsonPointSchema = z.object({
  type: z.literal('Point'),
  coordinates: z.array(z.number().finite()).min(2),
})

/**
 * Validate a size
 */
export function validateSize(size: unknown) {
  return sizeSchema.safeParse(size)
}

/**
 * Validate a cell address
 */
export function validateCellCoords(coords: unknown) {
  return cellCoordsSchema.safeParse(coords)
}
