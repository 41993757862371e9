/**
 * LazyChain: empty until touched
 *
 * Defers creating an {@link EagerChain} until the first operation that needs storage: iteration, any append or
 * insertion, or `followedBy`. Before that it answers every query exactly as an empty eager chain would.
 *
 * Materialization is an explicit two-state machine (`Uninitialized` → `Initialized`). JavaScript runs one call at a
 * time on a chain, so the transition happens at most once without further guarding; every later call sees the same
 * delegate.
 */

import * as Data from 'effect/Data'
import * as Equal from 'effect/Equal'
import * as Hash from 'effect/Hash'
import type { Unify } from 'effect/Unify'

import type { Segment } from '@message-chain/segments'

import { EagerChain, sameElements } from './eager-chain.domain.ts'
import { IndexOutOfBoundsError } from './errors.ts'
import { checkRange, type Message, type MessageChain, MessageChainTypeId } from './message-chain.ts'

type Cell = Data.TaggedEnum<{
	// biome-ignore lint/complexity/noBannedTypes: Data.TaggedEnum models payload-less cases as `{}`
	Uninitialized: {}
	Initialized: { readonly delegate: EagerChain }
}>

const Cell = Data.taggedEnum<Cell>()

const outOfBounds = (index: number): never => {
	throw new IndexOutOfBoundsError({ index, size: 0 })
}

export class LazyChain implements MessageChain {
	readonly [MessageChainTypeId]: MessageChainTypeId = MessageChainTypeId

	readonly _tag = 'LazyChain'

	private cell: Cell = Cell.Uninitialized()

	/** Whether the backing chain has been created */
	get isMaterialized(): boolean {
		return Cell.$is('Initialized')(this.cell)
	}

	get size(): number {
		return this.fold(
			() => 0,
			delegate => delegate.size,
		)
	}

	isEmpty(): boolean {
		return this.fold(
			() => true,
			delegate => delegate.isEmpty(),
		)
	}

	get(index: number): Segment {
		return this.fold(
			() => outOfBounds(index),
			delegate => delegate.get(index),
		)
	}

	set(index: number, element: Segment): Segment {
		return this.fold(
			() => outOfBounds(index),
			delegate => delegate.set(index, element),
		)
	}

	add(element: Segment): boolean {
		return this.materialize().add(element)
	}

	insert(index: number, element: Segment): void {
		this.materialize().insert(index, element)
	}

	addAll(elements: Iterable<Segment>): boolean {
		return this.materialize().addAll(elements)
	}

	insertAll(index: number, elements: Iterable<Segment>): boolean {
		return this.materialize().insertAll(index, elements)
	}

	removeAt(index: number): Segment {
		return this.fold(
			() => outOfBounds(index),
			delegate => delegate.removeAt(index),
		)
	}

	remove(element: Segment): boolean {
		return this.fold(
			() => false,
			delegate => delegate.remove(element),
		)
	}

	removeAll(elements: Iterable<Segment>): boolean {
		return this.fold(
			() => false,
			delegate => delegate.removeAll(elements),
		)
	}

	retainAll(elements: Iterable<Segment>): boolean {
		return this.fold(
			() => false,
			delegate => delegate.retainAll(elements),
		)
	}

	clear(): void {
		this.fold(
			() => undefined,
			delegate => delegate.clear(),
		)
	}

	has(element: Segment): boolean {
		return this.fold(
			() => false,
			delegate => delegate.has(element),
		)
	}

	hasAll(elements: Iterable<Segment>): boolean {
		return this.fold(
			() => elements[Symbol.iterator]().next().done === true,
			delegate => delegate.hasAll(elements),
		)
	}

	indexOf(element: Segment): number {
		return this.fold(
			() => -1,
			delegate => delegate.indexOf(element),
		)
	}

	lastIndexOf(element: Segment): number {
		return this.fold(
			() => -1,
			delegate => delegate.lastIndexOf(element),
		)
	}

	subsequence(from: number, to: number): Array<Segment> {
		return this.fold(
			() => {
				checkRange(from, to, 0)
				return []
			},
			delegate => delegate.subsequence(from, to),
		)
	}

	contains(sub: string): boolean {
		return this.fold(
			() => false,
			delegate => delegate.contains(sub),
		)
	}

	render(): string {
		return this.fold(
			() => '',
			delegate => delegate.render(),
		)
	}

	toString(): string {
		return this.render()
	}

	/** Always materializes: appending necessarily needs storage, even when `tail` turns out to be empty. */
	followedBy(tail: Message): MessageChain {
		this.materialize().followedBy(tail)
		return this
	}

	[Symbol.iterator](): Iterator<Segment> {
		return this.materialize()[Symbol.iterator]()
	}

	[Equal.symbol](that: Equal.Equal): boolean {
		return sameElements(this, that)
	}

	[Hash.symbol](): number {
		return this.fold(
			() => Hash.array([]),
			delegate => delegate[Hash.symbol](),
		)
	}

	private fold<A>(onUninitialized: () => A, onInitialized: (delegate: EagerChain) => A): Unify<A> {
		return Cell.$match(this.cell, {
			Initialized: ({ delegate }) => onInitialized(delegate),
			Uninitialized: onUninitialized,
		})
	}

	private materialize(): EagerChain {
		return this.fold(
			() => {
				const delegate = new EagerChain()
				this.cell = Cell.Initialized({ delegate })
				return delegate
			},
			delegate => delegate,
		)
	}
}
