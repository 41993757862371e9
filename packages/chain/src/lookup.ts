/**
 * Typed lookup
 *
 * Two ways to ask a chain for "the first segment of kind K":
 *
 * - **Reified** (`firstOfKind`, `firstOfKindOrThrow`, `anyOfKind`): takes the kind's class and matches with
 *   `instanceof`. Works for every kind, including ones defined by the host application.
 * - **Key-indexed** (`firstByKey`, `firstByKeyOrThrow`, `anyByKey`): takes a {@link SegmentKey} and dispatches through a
 *   fixed table. Keys outside the table are not an error; they simply find nothing.
 *
 * The key table is deliberately limited to the kinds listed in {@link LookupTable}. `RichMarkup.Key` and custom keys
 * are not wired and always yield `Option.none()`.
 */

import * as Either from 'effect/Either'
import { identity } from 'effect/Function'
import * as Option from 'effect/Option'

import {
	Image,
	Mention,
	MentionAll,
	MessageSource,
	PlainText,
	QuoteReply,
	type Segment,
	SegmentKey,
	type SegmentKind,
	Sticker,
} from '@message-chain/segments'

import { NoSuchSegmentError } from './domain/errors.ts'
import type { MessageChain } from './domain/message-chain.ts'

/**
 * Keys recognized by the key-indexed lookup
 */
export const LookupTable: ReadonlySet<SegmentKey.Any> = new Set<SegmentKey.Any>([
	Mention.Key,
	MentionAll.Key,
	PlainText.Key,
	Image.Key,
	Sticker.Key,
	QuoteReply.Key,
	MessageSource.Key,
])

/**
 * First element that is an instance of `kind`, scanning in order.
 */
export const firstOfKind = <M extends Segment>(chain: MessageChain, kind: SegmentKind<M>): Option.Option<M> => {
	for (const segment of chain) {
		if (segment instanceof kind) {
			return Option.some(segment)
		}
	}
	return Option.none()
}

export const firstOfKindEither = <M extends Segment>(
	chain: MessageChain,
	kind: SegmentKind<M>,
): Either.Either<M, NoSuchSegmentError> =>
	Either.fromOption(firstOfKind(chain, kind), () => new NoSuchSegmentError({ kind: kind.name }))

/** @throws NoSuchSegmentError */
export const firstOfKindOrThrow = <M extends Segment>(chain: MessageChain, kind: SegmentKind<M>): M =>
	Either.getOrThrowWith(firstOfKindEither(chain, kind), identity)

export const anyOfKind = <M extends Segment>(chain: MessageChain, kind: SegmentKind<M>): boolean =>
	Option.isSome(firstOfKind(chain, kind))

/**
 * First element of the kind identified by `key`, or `Option.none()` when there is none or the key is not in
 * {@link LookupTable}.
 */
export const firstByKey = <M extends Segment>(chain: MessageChain, key: SegmentKey<M>): Option.Option<M> =>
	LookupTable.has(key) ? firstOfKind(chain, key.kind) : Option.none()

export const firstByKeyEither = <M extends Segment>(
	chain: MessageChain,
	key: SegmentKey<M>,
): Either.Either<M, NoSuchSegmentError> =>
	Either.fromOption(firstByKey(chain, key), () => new NoSuchSegmentError({ kind: key.name }))

/** @throws NoSuchSegmentError */
export const firstByKeyOrThrow = <M extends Segment>(chain: MessageChain, key: SegmentKey<M>): M =>
	Either.getOrThrowWith(firstByKeyEither(chain, key), identity)

export const anyByKey = <M extends Segment>(chain: MessageChain, key: SegmentKey<M>): boolean =>
	Option.isSome(firstByKey(chain, key))
