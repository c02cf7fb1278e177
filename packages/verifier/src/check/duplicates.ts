/**
 * First-repeat scan shared by every uniqueness check.
 */

/**
 * Position of the first element equal to an earlier one, or `null`.
 *
 * Scans left to right and reports the second occurrence of whichever value
 * repeats first. Equality is `Set` equality (SameValueZero), so structured
 * entries must be projected to a primitive key.
 */
export function firstDuplicateElement<T>(items: Iterable<T>): number | null
export function firstDuplicateElement<T, K>(items: Iterable<T>, key: (item: T) => K): number | null
export function firstDuplicateElement<T>(
	items: Iterable<T>,
	key?: (item: T) => unknown
): number | null {
	const seen = new Set<unknown>()
	let position = 0
	for (const item of items) {
		const k = key ? key(item) : item
		if (seen.has(k)) return position
		seen.add(k)
		position++
	}
	return null
}
