/**
 * NullChain: the "no chain" sentinel
 *
 * A single process-wide instance that holds no elements and allocates no storage. Every accessor fails with
 * {@link NullChainAccessError} except:
 *
 * - `render()` / `toString()` → `"null"`
 * - `followedBy(tail)` → `toChain(tail)`; the sentinel is never mutated and never part of the result
 */

import * as Equal from 'effect/Equal'
import * as Hash from 'effect/Hash'

import type { Segment } from '@message-chain/segments'

import { toChain } from '../constructors.ts'
import { NullChainAccessError } from './errors.ts'
import { type Message, type MessageChain, MessageChainTypeId } from './message-chain.ts'

const accessing = (operation: string): never => {
	throw new NullChainAccessError({ operation })
}

class NullMessageChain implements MessageChain {
	readonly [MessageChainTypeId]: MessageChainTypeId = MessageChainTypeId

	readonly _tag = 'NullChain'

	get size(): number {
		return accessing('size')
	}

	isEmpty(): boolean {
		return accessing('isEmpty')
	}

	get(): Segment {
		return accessing('get')
	}

	set(): Segment {
		return accessing('set')
	}

	add(): boolean {
		return accessing('add')
	}

	insert(): void {
		accessing('insert')
	}

	addAll(): boolean {
		return accessing('addAll')
	}

	insertAll(): boolean {
		return accessing('insertAll')
	}

	removeAt(): Segment {
		return accessing('removeAt')
	}

	remove(): boolean {
		return accessing('remove')
	}

	removeAll(): boolean {
		return accessing('removeAll')
	}

	retainAll(): boolean {
		return accessing('retainAll')
	}

	clear(): void {
		accessing('clear')
	}

	has(): boolean {
		return accessing('has')
	}

	hasAll(): boolean {
		return accessing('hasAll')
	}

	indexOf(): number {
		return accessing('indexOf')
	}

	lastIndexOf(): number {
		return accessing('lastIndexOf')
	}

	subsequence(): Array<Segment> {
		return accessing('subsequence')
	}

	contains(): boolean {
		return accessing('contains')
	}

	render(): string {
		return 'null'
	}

	toString(): string {
		return 'null'
	}

	followedBy(tail: Message): MessageChain {
		return toChain(tail)
	}

	[Symbol.iterator](): Iterator<Segment> {
		return accessing('iterator')
	}

	[Equal.symbol](that: Equal.Equal): boolean {
		return this === that
	}

	[Hash.symbol](): number {
		return Hash.string('NullChain')
	}
}

export const NullChain: MessageChain = Object.freeze(new NullMessageChain())
