/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import {
	type AdjacencySensitive,
	AdjacencySensitiveTypeId,
	type Segment,
	SegmentTypeId,
} from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'
import { QuoteReply } from './quote-reply.schema.ts'

/**
 * Mention: addresses one member by id
 *
 * Adjacency-sensitive: when it directly follows a {@link QuoteReply} it is the implicit mention of the quoted author and
 * does not count as content.
 *
 * **Wire Format (DTO)**:
 * ```json
 * { "_tag": "Mention", "target": 10001, "display": "alice" }
 * ```
 */
export class Mention
	extends Schema.TaggedClass<Mention>()('Mention', {
		/** Member id being mentioned */
		target: Schema.Int.pipe(Schema.nonNegative()),

		/** Name shown in the rendering */
		display: Schema.String,
	})
	implements AdjacencySensitive
{
	static readonly decode = Schema.decodeUnknown(Mention)

	static readonly encode = Schema.encode(Mention)

	static readonly Tag = Mention._tag

	static readonly Key: SegmentKey<Mention> = SegmentKey.make('Mention', Mention)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	get [AdjacencySensitiveTypeId](): AdjacencySensitiveTypeId {
		return AdjacencySensitiveTypeId
	}

	isSuppressedAfter(previous: Segment): boolean {
		return previous._tag === QuoteReply.Tag
	}

	render(): string {
		return `@${this.display}`
	}
}

export declare namespace Mention {
	type Type = typeof Mention.Type

	type Dto = typeof Mention.Encoded
}
