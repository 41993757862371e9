/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type Segment, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * QuoteReply: reference to the message being replied to
 *
 * Not content-bearing on its own. A {@link Mention} placed right after a quote is the client's automatic mention of
 * the quoted author and is therefore not counted as content either.
 */
export class QuoteReply
	extends Schema.TaggedClass<QuoteReply>()('QuoteReply', {
		/** Id of the quoted message */
		sourceId: Schema.Int.pipe(Schema.nonNegative()),
	})
	implements Segment
{
	static readonly decode = Schema.decodeUnknown(QuoteReply)

	static readonly encode = Schema.encode(QuoteReply)

	static readonly Tag = QuoteReply._tag

	static readonly Key: SegmentKey<QuoteReply> = SegmentKey.make('QuoteReply', QuoteReply)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	render(): string {
		return `[quote:${this.sourceId}]`
	}
}

export declare namespace QuoteReply {
	type Type = typeof QuoteReply.Type

	type Dto = typeof QuoteReply.Encoded
}
