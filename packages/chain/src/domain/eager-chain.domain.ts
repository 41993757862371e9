/**
 * EagerChain: the chain variant that owns its storage
 *
 * A thin owning wrapper around one mutable array. Elements are never chains: bulk constructors receive segments only,
 * and `followedBy` flattens chain tails before appending.
 *
 * Bulk construction does not re-check singleton-only placement; only `followedBy` does.
 */

import * as Either from 'effect/Either'
import * as Equal from 'effect/Equal'
import { identity } from 'effect/Function'
import * as Hash from 'effect/Hash'

import type { Segment } from '@message-chain/segments'

import {
	checkElementIndex,
	checkPositionIndex,
	checkRange,
	flattenTail,
	isMessageChain,
	type Message,
	type MessageChain,
	MessageChainTypeId,
} from './message-chain.ts'

const includesEqual = (elements: ReadonlyArray<Segment>, element: Segment): boolean =>
	elements.some(candidate => Equal.equals(candidate, element))

export class EagerChain implements MessageChain {
	readonly [MessageChainTypeId]: MessageChainTypeId = MessageChainTypeId

	readonly _tag = 'EagerChain'

	constructor(private readonly elements: Array<Segment> = []) {}

	get size(): number {
		return this.elements.length
	}

	isEmpty(): boolean {
		return this.elements.length === 0
	}

	get(index: number): Segment {
		checkElementIndex(index, this.elements.length)
		return this.elements[index]
	}

	set(index: number, element: Segment): Segment {
		const previous = this.get(index)
		this.elements[index] = element
		return previous
	}

	add(element: Segment): boolean {
		this.elements.push(element)
		return true
	}

	insert(index: number, element: Segment): void {
		checkPositionIndex(index, this.elements.length)
		this.elements.splice(index, 0, element)
	}

	addAll(elements: Iterable<Segment>): boolean {
		const incoming = Array.from(elements)
		for (const element of incoming) {
			this.elements.push(element)
		}
		return incoming.length > 0
	}

	insertAll(index: number, elements: Iterable<Segment>): boolean {
		checkPositionIndex(index, this.elements.length)
		const incoming = Array.from(elements)
		this.elements.splice(index, 0, ...incoming)
		return incoming.length > 0
	}

	removeAt(index: number): Segment {
		const removed = this.get(index)
		this.elements.splice(index, 1)
		return removed
	}

	remove(element: Segment): boolean {
		const index = this.indexOf(element)
		if (index === -1) {
			return false
		}
		this.elements.splice(index, 1)
		return true
	}

	removeAll(elements: Iterable<Segment>): boolean {
		const doomed = Array.from(elements)
		return this.retainWhere(element => !includesEqual(doomed, element))
	}

	retainAll(elements: Iterable<Segment>): boolean {
		const kept = Array.from(elements)
		return this.retainWhere(element => includesEqual(kept, element))
	}

	clear(): void {
		this.elements.length = 0
	}

	has(element: Segment): boolean {
		return this.indexOf(element) !== -1
	}

	hasAll(elements: Iterable<Segment>): boolean {
		for (const element of elements) {
			if (!this.has(element)) {
				return false
			}
		}
		return true
	}

	indexOf(element: Segment): number {
		return this.elements.findIndex(candidate => Equal.equals(candidate, element))
	}

	lastIndexOf(element: Segment): number {
		return this.elements.findLastIndex(candidate => Equal.equals(candidate, element))
	}

	subsequence(from: number, to: number): Array<Segment> {
		checkRange(from, to, this.elements.length)
		return this.elements.slice(from, to)
	}

	contains(sub: string): boolean {
		return this.elements.some(element => element.render().includes(sub))
	}

	render(): string {
		return this.elements.map(element => element.render()).join('')
	}

	toString(): string {
		return this.render()
	}

	followedBy(tail: Message): MessageChain {
		const segments = Either.getOrThrowWith(flattenTail(tail), identity)
		for (const segment of segments) {
			this.elements.push(segment)
		}
		return this
	}

	[Symbol.iterator](): Iterator<Segment> {
		return this.elements[Symbol.iterator]()
	}

	[Equal.symbol](that: Equal.Equal): boolean {
		return sameElements(this, that)
	}

	[Hash.symbol](): number {
		return Hash.array(this.elements)
	}

	private retainWhere(predicate: (element: Segment) => boolean): boolean {
		const before = this.elements.length
		let write = 0
		for (const element of this.elements) {
			if (predicate(element)) {
				this.elements[write++] = element
			}
		}
		this.elements.length = write
		return write !== before
	}
}

/**
 * Element-wise sequence equality between a chain and any other value.
 *
 * Reads `that` by index so that comparing against a never-touched lazy chain does not materialize it. The Null Chain
 * is equal only to itself.
 */
export const sameElements = (self: MessageChain, that: unknown): boolean => {
	if (!isMessageChain(that) || that._tag === 'NullChain') {
		return false
	}
	if (self.size !== that.size) {
		return false
	}
	for (let index = 0; index < self.size; index++) {
		if (!Equal.equals(self.get(index), that.get(index))) {
			return false
		}
	}
	return true
}
