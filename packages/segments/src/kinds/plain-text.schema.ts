/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type Segment, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * PlainText: literal text content
 *
 * Renders as its content unchanged, so a chain made only of plain text renders as the concatenation of its parts.
 *
 * **Wire Format (DTO)**:
 * ```json
 * { "_tag": "PlainText", "content": "hello" }
 * ```
 */
export class PlainText
	extends Schema.TaggedClass<PlainText>()('PlainText', {
		content: Schema.String,
	})
	implements Segment
{
	/** Decode from unknown/wire format to a validated segment */
	static readonly decode = Schema.decodeUnknown(PlainText)

	/** Encode to wire format DTO */
	static readonly encode = Schema.encode(PlainText)

	static readonly Tag = PlainText._tag

	static readonly Key: SegmentKey<PlainText> = SegmentKey.make('PlainText', PlainText)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	render(): string {
		return this.content
	}
}

export declare namespace PlainText {
	type Type = typeof PlainText.Type

	type Dto = typeof PlainText.Encoded
}
