import * as Schema from 'effect/Schema'

import { Image } from './image.schema.ts'
import { Mention } from './mention.schema.ts'
import { MentionAll } from './mention-all.schema.ts'
import { MessageSource } from './message-source.schema.ts'
import { PlainText } from './plain-text.schema.ts'
import { QuoteReply } from './quote-reply.schema.ts'
import { RichMarkup } from './rich-markup.schema.ts'
import { Sticker } from './sticker.schema.ts'

/**
 * Schema union for runtime validation of any built-in segment
 *
 * Effect Schema discriminates by `_tag`.
 */
export const Segments = Schema.Union(PlainText, Mention, MentionAll, Image, Sticker, RichMarkup, QuoteReply, MessageSource)

/**
 * Union type of all built-in segments
 */
export type Segments = Schema.Schema.Type<typeof Segments>

export { Image, Mention, MentionAll, MessageSource, PlainText, QuoteReply, RichMarkup, Sticker }
