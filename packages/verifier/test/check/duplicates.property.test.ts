import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { firstDuplicateElement } from '../../src/check/duplicates.ts'

/** Quadratic reference: first position whose value occurs earlier. */
function referenceFirstDuplicate(values: readonly number[]): number | null {
	for (const [i, value] of values.entries()) {
		if (values.slice(0, i).includes(value)) return i
	}
	return null
}

const smallIntsArb = fc.array(fc.integer({ max: 12, min: 0 }), { maxLength: 30 })

describe('check/duplicates properties', () => {
	it('agrees with a quadratic reference scan', () => {
		fc.assert(
			fc.property(smallIntsArb, (values) => {
				assert.strictEqual(firstDuplicateElement(values), referenceFirstDuplicate(values))
			}),
			{ numRuns: 500 }
		)
	})

	it('the prefix before a reported position is duplicate-free', () => {
		fc.assert(
			fc.property(smallIntsArb, (values) => {
				const position = firstDuplicateElement(values)
				if (position === null) return new Set(values).size === values.length
				const prefix = values.slice(0, position)
				const repeated = values[position]
				return (
					repeated !== undefined &&
					new Set(prefix).size === prefix.length &&
					prefix.includes(repeated)
				)
			}),
			{ numRuns: 500 }
		)
	})

	it('appending a copy of an element of a unique sequence is reported at the end', () => {
		fc.assert(
			fc.property(
				fc.uniqueArray(fc.string(), { maxLength: 20, minLength: 1 }),
				fc.nat(),
				(values, pick) => {
					const copy = values[pick % values.length]
					if (copy === undefined) return false
					return firstDuplicateElement([...values, copy]) === values.length
				}
			),
			{ numRuns: 300 }
		)
	})
})
