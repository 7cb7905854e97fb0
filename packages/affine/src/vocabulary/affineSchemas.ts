/**
 * Affine Schemas
 *
 * Zod schemas for transform coefficients in the two orderings we accept:
 * affine order [a, b, c, d, e, f] and GDAL geotransform order
 * [c, a, b, f, d, e].
 */

import { z } from 'zod'

const coefficientSchema = z.number().finite()

/**
 * Six affine coefficients, affine order
 */
export const affineCoefficientsSchema = z.tuple([
  coefficientSchema,
  coefficientSchema,
  coefficientSchema,
  coefficientSchema,
  coefficientSchema,
  coefficientSchema,
])

export type AffineCoefficients = readonly [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
]

/**
 * GDAL geotransform: [c, a, b, f, d, e]
 */
export const gdalGeoTransformSchema = affineCoefficientsSchema

export type GdalGeoTransform = readonly [
  c: number,
  a: number,
  b: number,
  f: number,
  d: number,
  e: number,
]

/**
 * Validate six affine coefficients
 */
export function validateAffineCoefficients(coefficients: unknown) {
  return affineCoefficientsSchema.safeParse(coefficients)
}
