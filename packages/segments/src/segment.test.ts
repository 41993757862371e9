import { describe, expect, it } from 'vitest'

import { Image, Mention, MentionAll, MessageSource, PlainText, QuoteReply, RichMarkup, Sticker } from './kinds/index.ts'
import { isAdjacencySensitive, isSegment, isSingletonOnly } from './segment.ts'

describe('Segment contract', () => {
	const segments = [
		new PlainText({ content: 'hello' }),
		new Mention({ display: 'alice', target: 10001 }),
		new MentionAll(),
		new Image({ imageId: 'img-1' }),
		new Sticker({ stickerId: 14 }),
		new RichMarkup({ markup: '<card/>' }),
		new QuoteReply({ sourceId: 7 }),
		new MessageSource({ messageId: 7, senderId: 10001, sentAt: 1700000000 }),
	]

	describe('render', () => {
		it('renders each kind', () => {
			expect(segments.map(segment => segment.render())).toEqual([
				'hello',
				'@alice',
				'@all',
				'[image:img-1]',
				'[sticker:14]',
				'<card/>',
				'[quote:7]',
				'',
			])
		})
	})

	describe('markers', () => {
		it('recognizes every built-in kind as a segment', () => {
			expect(segments.every(isSegment)).toBe(true)
		})

		it('rejects values that are not segments', () => {
			expect(isSegment({ _tag: 'PlainText', content: 'x' })).toBe(false)
			expect(isSegment('x')).toBe(false)
			expect(isSegment(null)).toBe(false)
		})

		it('marks only RichMarkup as singleton-only', () => {
			expect(segments.filter(isSingletonOnly).map(segment => segment._tag)).toEqual(['RichMarkup'])
		})

		it('marks only Mention as adjacency-sensitive', () => {
			expect(segments.filter(isAdjacencySensitive).map(segment => segment._tag)).toEqual(['Mention'])
		})
	})

	describe('Mention adjacency', () => {
		const mention = new Mention({ display: 'alice', target: 10001 })

		it('is suppressed after a quote reply', () => {
			expect(mention.isSuppressedAfter(new QuoteReply({ sourceId: 1 }))).toBe(true)
		})

		it('is not suppressed after other kinds', () => {
			expect(mention.isSuppressedAfter(new PlainText({ content: 'hi' }))).toBe(false)
			expect(mention.isSuppressedAfter(new Mention({ display: 'bob', target: 10002 }))).toBe(false)
		})
	})
})
