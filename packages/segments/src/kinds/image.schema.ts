/** biome-ignore-all lint/style/useNamingConvention: Effect Schema TaggedClass requires PascalCase types and `_tag` discriminators */
import * as Schema from 'effect/Schema'

import { type Segment, SegmentTypeId } from '../segment.ts'
import { SegmentKey } from '../segment-key.ts'

/**
 * Image: reference to an uploaded image
 *
 * Only the id is modelled; uploading and resolving the image is the host application's concern.
 */
export class Image
	extends Schema.TaggedClass<Image>()('Image', {
		imageId: Schema.NonEmptyString,
	})
	implements Segment
{
	static readonly decode = Schema.decodeUnknown(Image)

	static readonly encode = Schema.encode(Image)

	static readonly Tag = Image._tag

	static readonly Key: SegmentKey<Image> = SegmentKey.make('Image', Image)

	get [SegmentTypeId](): SegmentTypeId {
		return SegmentTypeId
	}

	render(): string {
		return `[image:${this.imageId}]`
	}
}

export declare namespace Image {
	type Type = typeof Image.Type

	type Dto = typeof Image.Encoded
}
