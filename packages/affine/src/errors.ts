import { affineKeywords } from './vocabulary'
import type { AffineErrorCode } from './vocabulary'

/**
 * Base class for all affine transform errors
 */
export class AffineError extends Error {
  constructor(
    message: string,
    public readonly code: AffineErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'AffineError'
  }
}

/**
 * Thrown when transform coefficients are missing or not finite numbers
 */
export class InvalidTransformError extends AffineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, affineKeywords.errors.invalidTransform, details)
    this.name = 'InvalidTransformError'
  }
}

/**
 * Thrown when a transform with a zero determinant has to be inverted
 */
export class DegenerateTransformError extends AffineError {
  constructor(public readonly coefficients: ReadonlyArray<number>) {
    super(
      'Cannot invert degenerate transform',
      affineKeywords.errors.degenerateTransform,
      { coefficients },
    )
    this.name = 'DegenerateTransformError'
  }
}
