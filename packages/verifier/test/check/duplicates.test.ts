import assert from 'node:assert'
import { describe, it } from 'node:test'
import { firstDuplicateElement } from '../../src/check/duplicates.ts'

describe('check/duplicates', () => {
	describe('firstDuplicateElement', () => {
		it('should return null for an empty sequence', () => {
			assert.strictEqual(firstDuplicateElement([]), null)
		})

		it('should return null when all elements are distinct', () => {
			assert.strictEqual(firstDuplicateElement(['a', 'b', 'c']), null)
		})

		it('should report the position of the second occurrence', () => {
			assert.strictEqual(firstDuplicateElement(['a', 'b', 'a']), 2)
		})

		it('should report the first repeat observed, not the earliest repeated value', () => {
			// 'a' repeats at 3, but 'b' already repeated at 2
			assert.strictEqual(firstDuplicateElement(['a', 'b', 'b', 'a']), 2)
		})

		it('should report adjacent repeats', () => {
			assert.strictEqual(firstDuplicateElement([7, 7]), 1)
		})

		it('should compare through the key projection', () => {
			const items = [
				{ meta: 1, name: 'x' },
				{ meta: 2, name: 'y' },
				{ meta: 3, name: 'x' },
			]
			assert.strictEqual(
				firstDuplicateElement(items, (item) => item.name),
				2
			)
			assert.strictEqual(
				firstDuplicateElement(items, (item) => item.meta),
				null
			)
		})

		it('should treat distinct objects as distinct without a projection', () => {
			assert.strictEqual(firstDuplicateElement([{ n: 1 }, { n: 1 }]), null)
		})

		it('should treat NaN as equal to itself', () => {
			assert.strictEqual(firstDuplicateElement([Number.NaN, 1, Number.NaN]), 2)
		})

		it('should consume a single-pass iterable', () => {
			function* names(): Generator<string> {
				yield 'p'
				yield 'q'
				yield 'p'
				yield 'r'
			}
			assert.strictEqual(firstDuplicateElement(names()), 2)
		})

		it('should stop at the first repeat', () => {
			const visited: number[] = []
			const result = firstDuplicateElement([1, 2, 1, 3, 4], (n) => {
				visited.push(n)
				return n
			})
			assert.strictEqual(result, 2)
			assert.deepStrictEqual(visited, [1, 2, 1])
		})
	})
})
