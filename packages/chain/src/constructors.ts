/**
 * Chain constructors and composition
 *
 * Every constructor returns the {@link MessageChain} contract; callers never depend on the variant.
 *
 * @example
 *
 * ```typescript
 * import { PlainText, Mention } from '@message-chain/segments'
 *
 * const greeting = chainOf(new Mention({ display: 'alice', target: 10001 }), new PlainText({ content: ' hi' }))
 * greeting.render() // '@alice hi'
 *
 * const reply = plus(new PlainText({ content: 'a' }), new PlainText({ content: 'b' }))
 * reply.render() // 'ab'
 * ```
 */

import * as Cause from 'effect/Cause'
import * as Either from 'effect/Either'
import { identity } from 'effect/Function'

import { PlainText, type Segment } from '@message-chain/segments'

import { EagerChain } from './domain/eager-chain.domain.ts'
import { LazyChain } from './domain/lazy-chain.domain.ts'
import { flattenTail, isMessageChain, type Message, type MessageChain } from './domain/message-chain.ts'

const isSegmentIterable = (u: Segment | Iterable<Segment>): u is Iterable<Segment> => Symbol.iterator in u

/**
 * Empty chain.
 *
 * Without a hint, or with a hint of `0`, the chain is lazy and allocates nothing until first touched. Any other hint
 * yields an eager chain; the number itself is advisory.
 *
 * @throws IllegalArgumentException when `initialCapacity` is not a non-negative integer
 */
export const emptyChain = (initialCapacity?: number): MessageChain => {
	if (initialCapacity === undefined || initialCapacity === 0) {
		return new LazyChain()
	}
	if (!Number.isInteger(initialCapacity) || initialCapacity < 0) {
		throw new Cause.IllegalArgumentException(`initialCapacity must be a non-negative integer, got ${initialCapacity}`)
	}
	return new EagerChain([])
}

/**
 * Builds a chain from segments, or from one ordered collection of segments.
 *
 * No arguments yields a lazy empty chain. Singleton-only placement is not checked here: bulk construction trusts its
 * input, and only {@link MessageChain.followedBy} enforces it.
 *
 * For a single message prefer {@link toChain}, which returns an existing chain as-is.
 */
export function chainOf(...segments: Array<Segment>): MessageChain
export function chainOf(segments: Iterable<Segment>): MessageChain
export function chainOf(...messages: Array<Segment | Iterable<Segment>>): MessageChain {
	if (messages.length === 0) {
		return new LazyChain()
	}

	const elements: Array<Segment> = []
	for (const message of messages) {
		if (isSegmentIterable(message)) {
			elements.push(...message)
		} else {
			elements.push(message)
		}
	}
	return new EagerChain(elements)
}

/**
 * The chain for `message`: the same instance when it already is one, otherwise a new single-element chain.
 */
export const toChain = (message: Message): MessageChain =>
	isMessageChain(message) ? message : new EagerChain([message])

/**
 * Ordered collection → chain.
 */
export const toMessageChain = (segments: Iterable<Segment>): MessageChain => new EagerChain(Array.from(segments))

/**
 * Composes any two messages, preserving order.
 *
 * - segment + segment → a new chain holding both
 * - chain + anything → the left chain absorbs the right message (flattened); no new chain is allocated
 * - segment + chain → the segment is inserted at the head of the right chain
 * - segment + the null sentinel → a new chain holding the segment
 *
 * @throws SingletonFollowError when a singleton-only segment would end up following another message
 */
export const plus = (left: Message, right: Message): MessageChain => {
	if (isMessageChain(left)) {
		return left.followedBy(right)
	}
	if (isMessageChain(right)) {
		if (right._tag === 'NullChain') {
			return toChain(left)
		}
		Either.getOrThrowWith(flattenTail(right), identity)
		right.insert(0, left)
		return right
	}
	return new EagerChain([left]).followedBy(right)
}

/**
 * Appends `text` as a {@link PlainText} through `followedBy`.
 */
export const appendText = (chain: MessageChain, text: string): MessageChain =>
	chain.followedBy(new PlainText({ content: text }))

/**
 * Removes every element of the same kind as `segment`, then appends `segment`.
 */
export const addOrRemove = (chain: MessageChain, segment: Segment): void => {
	chain.removeAll(Array.from(chain).filter(element => element._tag === segment._tag))
	chain.add(segment)
}
