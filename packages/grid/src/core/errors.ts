/**
 * Grid Errors
 *
 * Every failure is thrown synchronously to the caller. Nothing in this
 * package catches or logs its own errors.
 */

import { gridKeywords } from '../vocabulary'
import type { GridErrorCode } from '../vocabulary'

/**
 * Base class for all grid errors
 */
export class GridError extends Error {
  constructor(
    message: string,
    public readonly code: GridErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'GridError'
  }
}

/**
 * A (col, row), cell or point falls outside the addressable extent
 */
export class OutOfBoundsError extends GridError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, gridKeywords.errors.outOfBounds, details)
    this.name = 'OutOfBoundsError'
  }
}

/**
 * Invalid construction parameters
 */
export class ConfigurationError extends GridError {
  constructor(
    message: string,
    code: GridErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details)
    this.name = 'ConfigurationError'
  }
}

/**
 * Grid or tile size with fewer than one column or row
 */
export class InvalidGridError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, gridKeywords.errors.invalidGrid, details)
    this.name = 'InvalidGridError'
  }
}

/**
 * Tiling that cannot partition the grid as asked
 */
export class InvalidTilingError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, gridKeywords.errors.invalidTiling, details)
    this.name = 'InvalidTilingError'
  }
}

/**
 * Cell coordinates that are not whole numbers, negative cell coordinates
 * at construction, or non-finite point coordinates
 */
export class InvalidCoordinateError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, gridKeywords.errors.invalidCoordinate, details)
    this.name = 'InvalidCoordinateError'
  }
}
