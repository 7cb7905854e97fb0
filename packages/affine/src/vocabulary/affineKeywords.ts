/**
 * Affine Keywords
 *
 * Constants shared by the affine transform package.
 */

export const affineKeywords = {
  /**
   * Object kinds (used as discriminators)
   */
  kinds: {
    affine: 'affine',
  },

  /**
   * Error codes carried by AffineError subclasses
   */
  errors: {
    invalidTransform: 'INVALID_TRANSFORM',
    degenerateTransform: 'DEGENERATE_TRANSFORM',
  },

  /**
   * Coefficient names in affine order (x = a*col + b*row + c, y = d*col + e*row + f)
   */
  coefficients: ['a', 'b', 'c', 'd', 'e', 'f'],
} as const

// ============================================================================
// Type Exports
// ============================================================================

export type AffineErrorCode =
  (typeof affineKeywords.errors)[keyof typeof affineKeywords.errors]

export type CoefficientName = (typeof affineKeywords.coefficients)[number]
