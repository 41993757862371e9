/**
 * Segment fixtures shared by the chain tests
 */

import {
	Image,
	Mention,
	MentionAll,
	MessageSource,
	PlainText,
	QuoteReply,
	RichMarkup,
	Sticker,
} from '@message-chain/segments'

export const text = (content: string): PlainText => new PlainText({ content })

export const mention = (display: string, target = 10001): Mention => new Mention({ display, target })

export const mentionAll = (): MentionAll => new MentionAll()

export const image = (imageId: string): Image => new Image({ imageId })

export const sticker = (stickerId: number): Sticker => new Sticker({ stickerId })

export const markup = (content: string): RichMarkup => new RichMarkup({ markup: content })

export const quote = (sourceId = 1): QuoteReply => new QuoteReply({ sourceId })

export const source = (messageId = 1): MessageSource => new MessageSource({ messageId, senderId: 10001, sentAt: 1700000000 })
