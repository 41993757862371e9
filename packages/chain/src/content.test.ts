import { describe, expect, it } from 'vitest'

import type { Segment } from '@message-chain/segments'

import { chainOf } from './constructors.ts'
import { forEachContent, hasContent } from './content.ts'
import type { MessageChain } from './domain/message-chain.ts'
import { image, markup, mention, mentionAll, quote, source, sticker, text } from './test/segments.fixture.ts'

const collectContent = (chain: MessageChain): Array<[Segment, number]> => {
	const visited: Array<[Segment, number]> = []
	forEachContent(chain, (segment, index) => {
		visited.push([segment, index])
	})
	return visited
}

describe('content', () => {
	describe('hasContent', () => {
		it('accepts the content-bearing kinds', () => {
			const segments = [mention('alice'), mentionAll(), text('hi'), image('img'), sticker(1), markup('<card/>')]

			expect(segments.every(hasContent)).toBe(true)
		})

		it('rejects quote replies and source metadata', () => {
			expect(hasContent(quote())).toBe(false)
			expect(hasContent(source())).toBe(false)
		})
	})

	describe('forEachContent', () => {
		it('suppresses a mention that directly follows a quote reply', () => {
			const hi = text('hi')
			const chain = chainOf(quote(), mention('alice'), hi)

			expect(collectContent(chain)).toEqual([[hi, 2]])
		})

		it('keeps a mention without a preceding quote reply', () => {
			const alice = mention('alice')
			const hi = text('hi')

			expect(collectContent(chainOf(alice, hi))).toEqual([
				[alice, 0],
				[hi, 1],
			])
		})

		it('keeps a mention that is separated from the quote reply', () => {
			const hi = text('hi ')
			const bob = mention('bob')
			const chain = chainOf(quote(), mention('alice'), hi, bob)

			expect(collectContent(chain)).toEqual([
				[hi, 2],
				[bob, 3],
			])
		})

		it('skips non-content kinds', () => {
			const pic = image('img')
			const chain = chainOf(source(), pic, quote())

			expect(collectContent(chain)).toEqual([[pic, 1]])
		})

		it('visits nothing on an empty chain', () => {
			expect(collectContent(chainOf())).toEqual([])
		})
	})
})
