/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type Segment, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * MentionAll: addresses every member of the group
 */
export class MentionAll extends Schema.TaggedClass<MentionAll>()('MentionAll', {}) implements Segment {
	static readonly decode = Schema.decodeUnknown(MentionAll)

	static readonly encode = Schema.encode(MentionAll)

	static readonly Tag = MentionAll._tag

	static readonly Key: SegmentKey<MentionAll> = SegmentKey.make('MentionAll', MentionAll)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	render(): string {
		return '@all'
	}
}

export declare namespace MentionAll {
	type Type = typeof MentionAll.Type
}
