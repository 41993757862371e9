import {
	Image,
	isAdjacencySensitive,
	Mention,
	MentionAll,
	PlainText,
	RichMarkup,
	type Segment,
	Sticker,
} from '@message-chain/segments'

import type { MessageChain } from './domain/message-chain.ts'

/**
 * Kinds that carry visible content
 */
const ContentTags: ReadonlySet<string> = new Set<string>([
	Mention.Tag,
	MentionAll.Tag,
	PlainText.Tag,
	Image.Tag,
	Sticker.Tag,
	RichMarkup.Tag,
])

/**
 * Whether `segment` is of a content-bearing kind, ignoring its position.
 */
export const hasContent = (segment: Segment): boolean => ContentTags.has(segment._tag)

/**
 * Visits every content-bearing element in order.
 *
 * An adjacency-sensitive element is skipped when the element right before it suppresses it (a mention directly after a
 * quote reply).
 */
export const forEachContent = (chain: MessageChain, f: (segment: Segment, index: number) => void): void => {
	let previous: Segment | undefined
	let index = 0

	for (const segment of chain) {
		const suppressed = isAdjacencySensitive(segment) && previous !== undefined && segment.isSuppressedAfter(previous)
		if (!suppressed && hasContent(segment)) {
			f(segment, index)
		}
		previous = segment
		index++
	}
}
