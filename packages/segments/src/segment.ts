/**
 * Segment capability contract
 *
 * A segment is one atomic unit of message content. The chain only relies on the capabilities declared here:
 *
 * - a `_tag` discriminant (the segment's kind)
 * - a human-readable `render()`
 * - optional markers: {@link SingletonOnly} and {@link AdjacencySensitive}
 *
 * Markers are carried by symbol-keyed type ids so that membership is a cheap `in` check and never depends on the
 * concrete class.
 */

import { hasProperty } from 'effect/Predicate'

export const SegmentTypeId: unique symbol = Symbol.for('@message-chain/segments/Segment')

export type SegmentTypeId = typeof SegmentTypeId

export const SingletonOnlyTypeId: unique symbol = Symbol.for('@message-chain/segments/SingletonOnly')

export type SingletonOnlyTypeId = typeof SingletonOnlyTypeId

export const AdjacencySensitiveTypeId: unique symbol = Symbol.for('@message-chain/segments/AdjacencySensitive')

export type AdjacencySensitiveTypeId = typeof AdjacencySensitiveTypeId

export interface Segment {
	readonly [SegmentTypeId]: SegmentTypeId

	/** Kind discriminant */
	readonly _tag: string

	/** Human-readable rendering, concatenated without separator by the chain */
	render(): string
}

/**
 * A segment that may only ever be the sole original element of a chain. It is rejected whenever it is appended.
 */
export interface SingletonOnly extends Segment {
	readonly [SingletonOnlyTypeId]: SingletonOnlyTypeId
}

/**
 * A segment whose content-bearing status depends on the element right before it.
 */
export interface AdjacencySensitive extends Segment {
	readonly [AdjacencySensitiveTypeId]: AdjacencySensitiveTypeId

	/** `true` when this segment stops counting as content because `previous` precedes it */
	isSuppressedAfter(previous: Segment): boolean
}

/**
 * Constructor of a concrete segment kind, used for reified lookups (`instanceof`).
 */
export type SegmentKind<M extends Segment> = new (...args: Array<never>) => M

export const isSegment = (u: unknown): u is Segment => hasProperty(u, SegmentTypeId)

export const isSingletonOnly = (u: unknown): u is SingletonOnly => hasProperty(u, SingletonOnlyTypeId)

export const isAdjacencySensitive = (u: unknown): u is AdjacencySensitive => hasProperty(u, AdjacencySensitiveTypeId)
