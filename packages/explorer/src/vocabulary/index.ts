/**
 * Explorer Vocabulary
 *
 * Keywords, schemas and the types inferred from them.
 */

// Keywords
export * from './keywords'

// Schemas
export * from './schemas'
