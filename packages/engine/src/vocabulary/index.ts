/**
 * Beat Engine Vocabulary
 *
 * Public exports for keywords, schemas and errors.
 * This is the single source of truth for all beat-related constants and types.
 */

// Keywords
export * from './keywords'

// Schemas
export * from './schemas'

// Errors
export * from './errors'

// Beat access helpers
export * from './beatAccess'
