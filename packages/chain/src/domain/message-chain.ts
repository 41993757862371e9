/**
 * MessageChain: ordered, mutable sequence of segments composing one message
 *
 * Composition rules:
 *
 * - Two messages that are not chains compose into a new chain.
 * - Two chains compose by the receiver absorbing the other's elements (flattened).
 * - A chain and a single segment compose by folding the segment into the chain, preserving order.
 *
 * Invariants:
 *
 * - No element of a chain is itself a chain.
 * - A singleton-only segment is never the result of an append.
 * - Order is insertion order; duplicates are allowed; equality is element-wise.
 *
 * The contract is implemented by exactly three variants, see {@link MessageChain.Variant}.
 */

import * as Either from 'effect/Either'
import type * as Equal from 'effect/Equal'
import { hasProperty } from 'effect/Predicate'

import { isSingletonOnly, type Segment } from '@message-chain/segments'

import { IndexOutOfBoundsError, SingletonFollowError } from './errors.ts'

export const MessageChainTypeId: unique symbol = Symbol.for('@message-chain/chain/MessageChain')

export type MessageChainTypeId = typeof MessageChainTypeId

/**
 * Anything that can take part in a composition: a single segment or a whole chain.
 */
export type Message = Segment | MessageChain

export interface MessageChain extends Iterable<Segment>, Equal.Equal {
	readonly [MessageChainTypeId]: MessageChainTypeId

	readonly _tag: MessageChain.Variant

	readonly size: number

	isEmpty(): boolean

	/** @throws IndexOutOfBoundsError */
	get(index: number): Segment

	/**
	 * Replaces the element at `index`, returning the previous one.
	 *
	 * @throws IndexOutOfBoundsError
	 */
	set(index: number, element: Segment): Segment

	/** Appends without the `followedBy` checks. Always `true`. */
	add(element: Segment): boolean

	/** @throws IndexOutOfBoundsError when `index` is outside `[0, size]` */
	insert(index: number, element: Segment): void

	addAll(elements: Iterable<Segment>): boolean

	/** @throws IndexOutOfBoundsError when `index` is outside `[0, size]` */
	insertAll(index: number, elements: Iterable<Segment>): boolean

	/** @throws IndexOutOfBoundsError */
	removeAt(index: number): Segment

	/** Removes the first element equal to `element` */
	remove(element: Segment): boolean

	removeAll(elements: Iterable<Segment>): boolean

	retainAll(elements: Iterable<Segment>): boolean

	clear(): void

	/** Membership by structural equality */
	has(element: Segment): boolean

	hasAll(elements: Iterable<Segment>): boolean

	indexOf(element: Segment): number

	lastIndexOf(element: Segment): number

	/**
	 * Copy of the half-open range `[from, to)`.
	 *
	 * @throws IndexOutOfBoundsError
	 */
	subsequence(from: number, to: number): Array<Segment>

	/** `true` iff some element's rendering contains `sub` (text search, not sequence containment) */
	contains(sub: string): boolean

	/** Concatenation of every element's rendering, in order, with no separator */
	render(): string

	/**
	 * Merges `tail` into this chain and returns the chain.
	 *
	 * A chain tail is flattened element by element. Nothing is appended when any incoming element is singleton-only.
	 *
	 * @throws SingletonFollowError
	 */
	followedBy(tail: Message): MessageChain
}

export declare namespace MessageChain {
	/** Closed set of implementations */
	type Variant = 'EagerChain' | 'LazyChain' | 'NullChain'
}

export const isMessageChain = (u: unknown): u is MessageChain => hasProperty(u, MessageChainTypeId)

/**
 * Flattens `tail` into the segments a merge would append, rejecting singleton-only ones.
 *
 * The result is a snapshot, so merging a chain into itself appends each element once.
 */
export const flattenTail = (tail: Message): Either.Either<ReadonlyArray<Segment>, SingletonFollowError> => {
	const segments: Array<Segment> = []

	for (const segment of isMessageChain(tail) ? tail : [tail]) {
		if (isSingletonOnly(segment)) {
			return Either.left(new SingletonFollowError({ tag: segment._tag }))
		}
		segments.push(segment)
	}

	return Either.right(segments)
}

/** @throws IndexOutOfBoundsError unless `0 <= index < size` */
export const checkElementIndex = (index: number, size: number): void => {
	if (!Number.isInteger(index) || index < 0 || index >= size) {
		throw new IndexOutOfBoundsError({ index, size })
	}
}

/** @throws IndexOutOfBoundsError unless `0 <= index <= size` */
export const checkPositionIndex = (index: number, size: number): void => {
	if (!Number.isInteger(index) || index < 0 || index > size) {
		throw new IndexOutOfBoundsError({ index, size })
	}
}

/** @throws IndexOutOfBoundsError unless `0 <= from <= to <= size` */
export const checkRange = (from: number, to: number, size: number): void => {
	checkPositionIndex(from, size)
	checkPositionIndex(to, size)
	if (from > to) {
		throw new IndexOutOfBoundsError({ index: from, size })
	}
}
