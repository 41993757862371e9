/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type SingletonOnly, SingletonOnlyTypeId, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * RichMarkup: a whole message expressed as structured markup (card, share link, etc.)
 *
 * Singleton-only: the markup replaces the message body, so it can only be the sole original element of a chain and is
 * rejected when appended.
 *
 * Its key is intentionally absent from the key-indexed lookup table; use the reified lookup for it.
 */
export class RichMarkup
	extends Schema.TaggedClass<RichMarkup>()('RichMarkup', {
		markup: Schema.String,
	})
	implements SingletonOnly
{
	static readonly decode = Schema.decodeUnknown(RichMarkup)

	static readonly encode = Schema.encode(RichMarkup)

	static readonly Tag = RichMarkup._tag

	static readonly Key: SegmentKey<RichMarkup> = SegmentKey.make('RichMarkup', RichMarkup)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	get [SingletonOnlyTypeId](): SingletonOnlyTypeId {
		return SingletonOnlyTypeId
	}

	render(): string {
		return this.markup
	}
}

export declare namespace RichMarkup {
	type Type = typeof RichMarkup.Type

	type Dto = typeof RichMarkup.Encoded
}
