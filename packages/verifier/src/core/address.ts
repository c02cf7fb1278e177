/**
 * Account addresses.
 *
 * An address is a fixed-width 16-byte value. Its text form is `0x` followed
 * by hex digits, where letter case and leading zeros carry no meaning:
 * `0x1`, `0x01` and `0x0…01` name one account. Module handles store the
 * canonical form so that comparing handles compares accounts.
 */

export const ADDRESS_LENGTH = 16

const ADDRESS_PATTERN = /^0x([0-9a-fA-F]+)$/

/**
 * Canonical text form: lowercase, no leading zeros, `0x0` for zero.
 * Returns null when `text` is not an address or is wider than 16 bytes.
 */
export function canonicalAddress(text: string): string | null {
	const digits = ADDRESS_PATTERN.exec(text)?.[1]
	if (digits === undefined) return null
	const significant = digits.replace(/^0+/, '').toLowerCase()
	if (significant.length > ADDRESS_LENGTH * 2) return null
	return `0x${significant === '' ? '0' : significant}`
}
