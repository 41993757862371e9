import * as Equal from 'effect/Equal'
import { describe, expect, it } from 'vitest'

import { toChain } from '../constructors.ts'
import { markup, text } from '../test/segments.fixture.ts'
import { EagerChain } from './eager-chain.domain.ts'
import { NullChainAccessError } from './errors.ts'
import { NullChain } from './null-chain.domain.ts'

describe('NullChain', () => {
	it('renders as "null"', () => {
		expect(NullChain.render()).toBe('null')
		expect(String(NullChain)).toBe('null')
	})

	it('fails every structural accessor with an error naming the sentinel', () => {
		const accessors: ReadonlyArray<() => unknown> = [
			() => NullChain.size,
			() => NullChain.isEmpty(),
			() => NullChain.get(0),
			() => NullChain.set(0, text('a')),
			() => NullChain.add(text('a')),
			() => NullChain.insert(0, text('a')),
			() => NullChain.addAll([]),
			() => NullChain.insertAll(0, []),
			() => NullChain.removeAt(0),
			() => NullChain.remove(text('a')),
			() => NullChain.removeAll([]),
			() => NullChain.retainAll([]),
			() => NullChain.clear(),
			() => NullChain.has(text('a')),
			() => NullChain.hasAll([]),
			() => NullChain.indexOf(text('a')),
			() => NullChain.lastIndexOf(text('a')),
			() => NullChain.subsequence(0, 0),
			() => NullChain.contains('a'),
			() => Array.from(NullChain),
		]

		for (const access of accessors) {
			expect(access).toThrow(NullChainAccessError)
			expect(access).toThrow('accessing NullChain')
		}
	})

	it('records which accessor was called', () => {
		let caught: unknown
		try {
			NullChain.get(0)
		} catch (error) {
			caught = error
		}

		expect(caught).toBeInstanceOf(NullChainAccessError)
		expect(caught instanceof NullChainAccessError && caught.operation).toBe('get')
	})

	describe('followedBy', () => {
		it('promotes a segment to a new chain', () => {
			const segment = text('hi')

			const result = NullChain.followedBy(segment)

			expect(result).not.toBe(NullChain)
			expect(Equal.equals(result, toChain(segment))).toBe(true)
			expect(result.render()).toBe('hi')
		})

		it('returns a chain tail as-is', () => {
			const tail = new EagerChain([text('a')])

			expect(NullChain.followedBy(tail)).toBe(tail)
		})

		it('accepts a singleton-only tail as the sole element of the promoted chain', () => {
			expect(NullChain.followedBy(markup('<card/>')).size).toBe(1)
		})

		it('leaves the sentinel unchanged', () => {
			NullChain.followedBy(text('hi'))

			expect(() => NullChain.size).toThrow(NullChainAccessError)
			expect(NullChain.render()).toBe('null')
		})
	})

	it('equals only itself', () => {
		expect(Equal.equals(NullChain, NullChain)).toBe(true)
		expect(Equal.equals(NullChain, new EagerChain())).toBe(false)
		expect(Equal.equals(new EagerChain(), NullChain)).toBe(false)
	})
})
