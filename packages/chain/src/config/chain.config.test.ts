import { describe, expect, it } from '@effect/vitest'
import * as ConfigProvider from 'effect/ConfigProvider'
import * as Effect from 'effect/Effect'
import * as Exit from 'effect/Exit'

import { ChainConfig, DEFAULT_INITIAL_CAPACITY } from './chain.config.ts'

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
	Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe('ChainConfig', () => {
	it.effect('defaults the initial capacity', () =>
		Effect.gen(function* () {
			const config = yield* ChainConfig

			expect(config.initialCapacity).toBe(DEFAULT_INITIAL_CAPACITY)
		}).pipe(Effect.provide(ChainConfig.Default), withEnv([])),
	)

	it.effect('reads MESSAGE_CHAIN_INITIAL_CAPACITY', () =>
		Effect.gen(function* () {
			const config = yield* ChainConfig

			expect(config.initialCapacity).toBe(0)
		}).pipe(Effect.provide(ChainConfig.Default), withEnv([['MESSAGE_CHAIN_INITIAL_CAPACITY', '0']])),
	)

	it.effect('rejects a negative capacity', () =>
		Effect.gen(function* () {
			const result = yield* Effect.exit(
				ChainConfig.pipe(Effect.provide(ChainConfig.Default), withEnv([['MESSAGE_CHAIN_INITIAL_CAPACITY', '-2']])),
			)

			expect(Exit.isFailure(result)).toBe(true)
		}),
	)

	it.effect('rejects a non-integer capacity', () =>
		Effect.gen(function* () {
			const result = yield* Effect.exit(
				ChainConfig.pipe(Effect.provide(ChainConfig.Default), withEnv([['MESSAGE_CHAIN_INITIAL_CAPACITY', 'many']])),
			)

			expect(Exit.isFailure(result)).toBe(true)
		}),
	)
})
