/**
 * Compose Chain Workflow
 *
 * Effect-returning counterparts of the synchronous chain API. The list API throws its contract violations; here they
 * surface as typed failures so callers can compose them with other Effect programs:
 *
 * - `makeChain`: empty chain sized from {@link ChainConfig}
 * - `composeChain`: folds messages into a fresh chain with `followedBy`
 * - `followedByEffect`: one merge with a typed failure
 * - `firstOfKindEffect` / `firstByKeyEffect`: lookups failing with {@link NoSuchSegmentError}
 *
 * @example
 *
 * ```typescript
 * import * as Effect from 'effect/Effect'
 *
 * import { Mention, PlainText } from '@message-chain/segments'
 *
 * const program = composeChain([new Mention({ display: 'alice', target: 10001 }), new PlainText({ content: ' hi' })]).pipe(
 * 	Effect.map(chain => chain.render()),
 * 	Effect.provide(ChainConfig.Default),
 * )
 * // Effect<string, ChainError | UnknownException, never>
 * ```
 */

import * as Cause from 'effect/Cause'
import * as Effect from 'effect/Effect'

import type { Segment, SegmentKey, SegmentKind } from '@message-chain/segments'

import { ChainConfig } from '../config/chain.config.ts'
import { emptyChain } from '../constructors.ts'
import { type ChainError, isChainError, type NoSuchSegmentError } from '../domain/errors.ts'
import type { Message, MessageChain } from '../domain/message-chain.ts'
import { firstByKeyEither, firstOfKindEither } from '../lookup.ts'

/**
 * Empty chain using the configured capacity hint.
 */
export const makeChain: Effect.Effect<MessageChain, never, ChainConfig> = Effect.gen(function* () {
	const { initialCapacity } = yield* ChainConfig
	const chain = emptyChain(initialCapacity)

	yield* Effect.logDebug('Message chain created', { initialCapacity, variant: chain._tag })

	return chain
})

/**
 * Merges `tail` into `chain`. A rejected merge leaves `chain` untouched.
 */
export const followedByEffect = (
	chain: MessageChain,
	tail: Message,
): Effect.Effect<MessageChain, ChainError | Cause.UnknownException> =>
	Effect.try({
		catch: error => (isChainError(error) ? error : new Cause.UnknownException(error)),
		try: () => chain.followedBy(tail),
	})

/**
 * Folds `messages` into a new chain, in order. Chains among them are flattened.
 */
export const composeChain = (
	messages: Iterable<Message>,
): Effect.Effect<MessageChain, ChainError | Cause.UnknownException, ChainConfig> =>
	Effect.gen(function* () {
		const chain = yield* makeChain

		for (const message of messages) {
			yield* followedByEffect(chain, message)
		}

		yield* Effect.logDebug('Message chain composed', { size: chain.size })

		return chain
	}).pipe(
		Effect.tapError(error => Effect.logWarning('Message chain composition rejected', { error: error.message })),
		Effect.withSpan('composeChain'),
	)

export const firstOfKindEffect = <M extends Segment>(
	chain: MessageChain,
	kind: SegmentKind<M>,
): Effect.Effect<M, NoSuchSegmentError> => Effect.suspend(() => firstOfKindEither(chain, kind))

export const firstByKeyEffect = <M extends Segment>(
	chain: MessageChain,
	key: SegmentKey<M>,
): Effect.Effect<M, NoSuchSegmentError> => Effect.suspend(() => firstByKeyEither(chain, key))
