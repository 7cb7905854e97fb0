/**
 * Grid Vocabulary
 *
 * Public exports for keywords and schemas.
 */

// Keywords
export * from './gridKeywords'

// Schemas
export * from './gridSchemas'
