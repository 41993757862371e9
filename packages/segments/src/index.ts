/**
 * Segments Package
 *
 * The segment capability contract, lookup keys and the built-in segment kinds.
 */

export * from './kinds/index.ts'
export * from './segment.ts'
export * from './segment-key.ts'
