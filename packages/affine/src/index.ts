/**
 * @rastergrid/affine
 *
 * Affine transforms between grid space and model space.
 */

// ============================================================================
// Vocabulary - keywords and coefficient schemas
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Errors
// ============================================================================

export * from './errors'

// ============================================================================
// Transforms
// ============================================================================

export * from './affine'
