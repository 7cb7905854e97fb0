/**
 * Affine Vocabulary
 *
 * Public exports for keywords and schemas.
 */

// Keywords
export * from './affineKeywords'

// Schemas
export * from './affineSchemas'
