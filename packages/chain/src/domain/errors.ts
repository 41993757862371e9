/**
 * Chain errors
 *
 * Every failure of the chain API is a programming-contract violation, not a transient fault: they are thrown by the
 * synchronous list API and surface as typed failures in the Effect API. Each class is a `Data.TaggedError`, so the same
 * value is both a throwable `Error` and a yieldable Effect.
 */

import * as Data from 'effect/Data'
import { isTagged } from 'effect/Predicate'

/**
 * NullChainAccessError: structural access on the Null Chain sentinel
 */
export class NullChainAccessError extends Data.TaggedError('NullChainAccessError')<{
	/** Name of the accessor that was called */
	readonly operation: string
}> {
	get message(): string {
		return 'accessing NullChain'
	}
}

/**
 * IndexOutOfBoundsError: index outside `[0, size)` (or `[0, size]` for insertion)
 */
export class IndexOutOfBoundsError extends Data.TaggedError('IndexOutOfBoundsError')<{
	readonly index: number
	readonly size: number
}> {
	get message(): string {
		return `Index ${this.index} out of bounds for length ${this.size}`
	}
}

/**
 * SingletonFollowError: a singleton-only segment was appended with `followedBy`
 */
export class SingletonFollowError extends Data.TaggedError('SingletonFollowError')<{
	/** Kind of the rejected segment */
	readonly tag: string
}> {
	get message(): string {
		return 'singleton-only message cannot follow another message'
	}
}

/**
 * NoSuchSegmentError: typed lookup found no matching element
 *
 * Only raised by the `-OrThrow` lookups; plain lookups return `Option.none()`.
 */
export class NoSuchSegmentError extends Data.TaggedError('NoSuchSegmentError')<{
	/** Name of the kind or key that was looked up */
	readonly kind: string
}> {
	get message(): string {
		return `no such element: ${this.kind}`
	}
}

export type ChainError = NullChainAccessError | IndexOutOfBoundsError | SingletonFollowError | NoSuchSegmentError

export const isChainError = (u: unknown): u is ChainError =>
	isTagged(u, 'NullChainAccessError') ||
	isTagged(u, 'IndexOutOfBoundsError') ||
	isTagged(u, 'SingletonFollowError') ||
	isTagged(u, 'NoSuchSegmentError')
