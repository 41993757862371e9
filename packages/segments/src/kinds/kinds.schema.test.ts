import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'
import * as Equal from 'effect/Equal'
import * as Exit from 'effect/Exit'
import * as Schema from 'effect/Schema'

import { Image, Mention, MentionAll, PlainText, Segments, Sticker } from './index.ts'

describe('Segment kinds', () => {
	describe('Schema Validation', () => {
		it.effect('decodes a mention from its wire format', () =>
			Effect.gen(function* () {
				// Arrange
				const dto = { _tag: 'Mention' as const, display: 'alice', target: 10001 }

				// Act
				const mention = yield* Mention.decode(dto)

				// Assert
				expect(mention).toBeInstanceOf(Mention)
				expect(mention.target).toBe(10001)
				expect(mention.render()).toBe('@alice')
			}),
		)

		it.effect('rejects a negative mention target', () =>
			Effect.gen(function* () {
				const result = yield* Effect.exit(Mention.decode({ _tag: 'Mention', display: 'alice', target: -1 }))

				expect(Exit.isFailure(result)).toBe(true)
			}),
		)

		it.effect('rejects an empty image id', () =>
			Effect.gen(function* () {
				const result = yield* Effect.exit(Image.decode({ _tag: 'Image', imageId: '' }))

				expect(Exit.isFailure(result)).toBe(true)
			}),
		)

		it.effect('encodes a sticker back to its wire format', () =>
			Effect.gen(function* () {
				const dto = yield* Sticker.encode(new Sticker({ stickerId: 3 }))

				expect(dto).toEqual({ _tag: 'Sticker', stickerId: 3 })
			}),
		)

		it('decodes any built-in kind through the union by its tag', () => {
			const decode = Schema.decodeUnknownSync(Segments)

			expect(decode({ _tag: 'PlainText', content: 'hi' })).toBeInstanceOf(PlainText)
			expect(decode({ _tag: 'MentionAll' })).toBeInstanceOf(MentionAll)
			expect(() => decode({ _tag: 'Unknown' })).toThrow()
		})
	})

	describe('Equality', () => {
		it('compares segments structurally', () => {
			expect(Equal.equals(new PlainText({ content: 'a' }), new PlainText({ content: 'a' }))).toBe(true)
			expect(Equal.equals(new PlainText({ content: 'a' }), new PlainText({ content: 'b' }))).toBe(false)
			expect(Equal.equals(new MentionAll(), new MentionAll())).toBe(true)
		})
	})
})
