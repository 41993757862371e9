/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type Segment, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * MessageSource: provenance metadata of a received message
 *
 * Carries the ids needed to quote or recall the message later. It has no visible rendering.
 */
export class MessageSource
	extends Schema.TaggedClass<MessageSource>()('MessageSource', {
		messageId: Schema.Int,
		senderId: Schema.Int,

		/** Epoch seconds */
		sentAt: Schema.Int,
	})
	implements Segment
{
	static readonly decode = Schema.decodeUnknown(MessageSource)

	static readonly encode = Schema.encode(MessageSource)

	static readonly Tag = MessageSource._tag

	static readonly Key: SegmentKey<MessageSource> = SegmentKey.make('MessageSource', MessageSource)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	render(): string {
		return ''
	}
}

export declare namespace MessageSource {
	type Type = typeof MessageSource.Type

	type Dto = typeof MessageSource.Encoded
}
