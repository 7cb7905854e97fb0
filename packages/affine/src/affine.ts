/**
 * Affine Transforms
 *
 * Six-parameter affine mapping from grid space (col, row) to model
 * space (x, y):
 *
 *   x = a * col + b * row + c
 *   y = d * col + e * row + f
 *
 * Responsibilities:
 * - Describe the transform capability grids consume (AffineTransform)
 * - Build, compose, translate and invert concrete transforms (Affine)
 * - Convert to and from GDAL geotransform ordering
 *
 * Transforms are plain frozen objects; every operation returns a new one.
 */

import { DegenerateTransformError, InvalidTransformError } from './errors'
import {
  affineCoefficientsSchema,
  affineKeywords,
  gdalGeoTransformSchema,
} from './vocabulary'
import type { AffineCoefficients, GdalGeoTransform } from './vocabulary'

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that maps grid space to model space and back.
 *
 * Grids accept any value of this shape; they never build one themselves
 * except when deriving a tile's transform from its parent's coefficients.
 */
export type AffineTransform = {
  readonly a: number
  readonly b: number
  readonly c: number
  readonly d: number
  readonly e: number
  readonly f: number

  /** Grid (col, row) to model (x, y) */
  forward: (col: number, row: number) => [number, number]

  /** Model (x, y) to fractional grid (col, row) */
  inverse: (x: number, y: number) => [number, number]
}

/**
 * Concrete transform built by this package
 */
export type Affine = AffineTransform & {
  readonly kind: typeof affineKeywords.kinds.affine
  readonly coefficients: AffineCoefficients
  readonly determinant: number
  readonly isDegenerate: boolean

  /** No rotation or shear (or a pure 90 degree swap of the axes) */
  readonly isRectilinear: boolean

  /** Apply `other` first, then this transform */
  compose: (other: AffineTransform) => Affine

  /**
   * Move the grid origin to (col, row): the linear part is kept and the
   * translation becomes this transform applied to (col, row).
   */
  translate: (col: number, row: number) => Affine

  invert: () => Affine
  toGdal: () => GdalGeoTransform
  equals: (other: AffineTransform) => boolean
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Create a transform from coefficients in affine order [a, b, c, d, e, f]
 */
export function createAffine(coefficients: ReadonlyArray<number>): Affine {
  const parsed = affineCoefficientsSchema.safeParse(coefficients)
  if (!parsed.success) {
    throw new InvalidTransformError(
      'Affine transform needs six finite coefficients',
      { coefficients, issues: parsed.error.issues },
    )
  }

  const [a, b, c, d, e, f] = parsed.data
  const determinant = a * e - b * d

  const inverse = (x: number, y: number): [number, number] => {
    if (determinant === 0) {
      throw new DegenerateTransformError([a, b, c, d, e, f])
    }

    // Divide by the determinant last so integral corners come back exact
    const dx = x - c
    const dy = y - f
    return [(e * dx - b * dy) / determinant, (a * dy - d * dx) / determinant]
  }

  const affine: Affine = {
    kind: affineKeywords.kinds.affine,
    a,
    b,
    c,
    d,
    e,
    f,
    coefficients: [a, b, c, d, e, f],
    determinant,
    isDegenerate: determinant === 0,
    isRectilinear: (b === 0 && d === 0) || (a === 0 && e === 0),

    forward: (col, row) => [a * col + b * row + c, d * col + e * row + f],

    inverse,

    compose: (other) =>
      createAffine([
        a * other.a + b * other.d,
        a * other.b + b * other.e,
        a * other.c + b * other.f + c,
        d * other.a + e * other.d,
        d * other.b + e * other.e,
        d * other.c + e * other.f + f,
      ]),

    translate: (col, row) => {
      const [x, y] = affine.forward(col, row)
      return createAffine([a, b, x, d, e, y])
    },

    invert: () => {
      if (determinant === 0) {
        throw new DegenerateTransformError([a, b, c, d, e, f])
      }

      const ra = e / determinant
      const rb = -b / determinant
      const rd = -d / determinant
      const re = a / determinant

      return createAffine([ra, rb, -c * ra - f * rb, rd, re, -c * rd - f * re])
    },

    toGdal: () => [c, a, b, f, d, e],

    equals: (other) =>
      a === other.a &&
      b === other.b &&
      c === other.c &&
      d === other.d &&
      e === other.e &&
      f === other.f,
  }

  return Object.freeze(affine)
}

/** The identity transform */
export function identity(): Affine {
  return createAffine([1, 0, 0, 0, 1, 0])
}

/** Create a translation transform */
export function translation(xoff: number, yoff: number): Affine {
  return createAffine([1, 0, xoff, 0, 1, yoff])
}

/** Create a scaling transform. If only one argument, scale uniformly. */
export function scale(sx: number, sy: number = sx): Affine {
  return createAffine([sx, 0, 0, 0, sy, 0])
}

/**
 * Create a transform from a GDAL geotransform [c, a, b, f, d, e]
 */
export function fromGdal(geotransform: ReadonlyArray<number>): Affine {
  const parsed = gdalGeoTransformSchema.safeParse(geotransform)
  if (!parsed.success) {
    throw new InvalidTransformError(
      'GDAL geotransform needs six finite coefficients',
      { geotransform, issues: parsed.error.issues },
    )
  }

  const [c, a, b, f, d, e] = parsed.data
  return createAffine([a, b, c, d, e, f])
}

/**
 * Normalize a caller-supplied transform or coefficient list to an Affine.
 *
 * Values already built by createAffine are returned as they are.
 */
export function toAffine(
  transform: AffineTransform | AffineCoefficients,
): Affine {
  if ('forward' in transform) {
    if (isAffine(transform)) return transform

    return createAffine([
      transform.a,
      transform.b,
      transform.c,
      transform.d,
      transform.e,
      transform.f,
    ])
  }

  return createAffine(transform)
}

/**
 * Check whether a transform was built by this package
 */
export function isAffine(transform: AffineTransform): transform is Affine {
  return 'kind' in transform && transform.kind === affineKeywords.kinds.affine
}
