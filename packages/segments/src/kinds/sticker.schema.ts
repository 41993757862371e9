/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type Segment, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * Sticker: built-in emoticon identified by a numeric id
 */
export class Sticker
	extends Schema.TaggedClass<Sticker>()('Sticker', {
		stickerId: Schema.Int.pipe(Schema.nonNegative()),
	})
	implements Segment
{
	static readonly decode = Schema.decodeUnknown(Sticker)

	static readonly encode = Schema.encode(Sticker)

	static readonly Tag = Sticker._tag

	static readonly Key: SegmentKey<Sticker> = SegmentKey.make('Sticker', Sticker)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	render(): string {
		return `[sticker:${this.stickerId}]`
	}
}

export declare namespace Sticker {
	type Type = typeof Sticker.Type

	type Dto = typeof Sticker.Encoded
}
