import type { Segment, SegmentKind } from './segment.ts'

/**
 * SegmentKey: identity token for one segment kind
 *
 * Each concrete kind owns exactly one key (its static `Key`). Keys carry no ordering; two keys are the same key only
 * when they are the same instance.
 *
 * @example
 *
 * ```typescript
 * import type * as Option from 'effect/Option'
 *
 * import { firstByKey, type MessageChain } from '@message-chain/chain'
 * import { PlainText } from '@message-chain/segments'
 *
 * declare const chain: MessageChain
 *
 * const text: Option.Option<PlainText> = firstByKey(chain, PlainText.Key)
 * ```
 */
export class SegmentKey<M extends Segment> {
	private constructor(
		readonly name: string,
		readonly kind: SegmentKind<M>,
	) {}

	static make<M extends Segment>(name: string, kind: SegmentKind<M>): SegmentKey<M> {
		return new SegmentKey(name, kind)
	}

	toString(): string {
		return this.name
	}
}

export declare namespace SegmentKey {
	/** A key of any segment kind */
	type Any = SegmentKey<Segment>
}
