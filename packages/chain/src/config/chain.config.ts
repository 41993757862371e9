/**
 * Chain configuration with environment variable overrides.
 *
 * Environment variables:
 *
 * - `MESSAGE_CHAIN_INITIAL_CAPACITY`: capacity hint for chains created by the Effect API (default: 8). `0` selects the
 *   lazy chain.
 *
 * Testing: override with `ConfigProvider.fromMap` or replace the layer with `Layer.succeed(ChainConfig, ...)`.
 */

import * as Config from 'effect/Config'
import * as Effect from 'effect/Effect'

export const DEFAULT_INITIAL_CAPACITY = 8

export class ChainConfig extends Effect.Service<ChainConfig>()('@message-chain/chain/ChainConfig', {
	effect: Effect.gen(function* () {
		const config: { initialCapacity: number } = yield* Config.all({
			initialCapacity: Config.integer('MESSAGE_CHAIN_INITIAL_CAPACITY').pipe(
				Config.validate({
					message: 'Expected a non-negative integer',
					validation: (value: number) => value >= 0,
				}),
				Config.withDefault(DEFAULT_INITIAL_CAPACITY),
			),
		})

		yield* Effect.logDebug('Message chain configuration loaded', { initialCapacity: config.initialCapacity })

		return config
	}).pipe(Effect.withSpan('ChainConfig')),
}) {}
