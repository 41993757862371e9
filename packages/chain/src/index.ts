/**
 * Chain Package
 *
 * Message chains: the eager, lazy and null variants, their constructors, merge rules, typed lookup and content
 * iteration.
 */

// Config
export * from './config/chain.config.ts'
// Constructors & composition
export * from './constructors.ts'
// Content
export * from './content.ts'
// Domain
export * from './domain/eager-chain.domain.ts'
export * from './domain/errors.ts'
export * from './domain/lazy-chain.domain.ts'
export * from './domain/message-chain.ts'
export * from './domain/null-chain.domain.ts'
// Lookup
export * from './lookup.ts'
// Workflows
export * from './workflows/compose-chain.workflow.ts'
