/**
 * Type signature tokens.
 *
 * Tokens are plain tagged objects. They are compared by value through
 * `signatureTokenKey` in check/keys.ts, never by reference.
 */

import type { StructHandleIndex } from './indices.ts'

export const SignatureTokenKind = {
	Address: 4,
	Bool: 0,
	MutableReference: 10,
	Reference: 9,
	Signer: 5,
	Struct: 7,
	StructInstantiation: 8,
	TypeParameter: 11,
	U128: 3,
	U64: 2,
	U8: 1,
	Vector: 6,
} as const

export type SignatureTokenKind = (typeof SignatureTokenKind)[keyof typeof SignatureTokenKind]

export type PrimitiveTokenKind =
	| typeof SignatureTokenKind.Address
	| typeof SignatureTokenKind.Bool
	| typeof SignatureTokenKind.Signer
	| typeof SignatureTokenKind.U128
	| typeof SignatureTokenKind.U64
	| typeof SignatureTokenKind.U8

export interface PrimitiveToken {
	readonly kind: PrimitiveTokenKind
}

export interface VectorToken {
	readonly kind: typeof SignatureTokenKind.Vector
	readonly element: SignatureToken
}

export interface StructToken {
	readonly kind: typeof SignatureTokenKind.Struct
	readonly handle: StructHandleIndex
}

export interface StructInstantiationToken {
	readonly kind: typeof SignatureTokenKind.StructInstantiation
	readonly handle: StructHandleIndex
	readonly typeArguments: readonly SignatureToken[]
}

export interface ReferenceToken {
	readonly kind: typeof SignatureTokenKind.Reference | typeof SignatureTokenKind.MutableReference
	readonly referent: SignatureToken
}

export interface TypeParameterToken {
	readonly kind: typeof SignatureTokenKind.TypeParameter
	/** Position in the enclosing generic's type parameter list */
	readonly index: number
}

export type SignatureToken =
	| PrimitiveToken
	| VectorToken
	| StructToken
	| StructInstantiationToken
	| ReferenceToken
	| TypeParameterToken

/**
 * Shorthand constructors, mostly for building modules in code.
 */
export const Type = {
	address: { kind: SignatureTokenKind.Address },
	bool: { kind: SignatureTokenKind.Bool },
	mutableReference(referent: SignatureToken): ReferenceToken {
		return { kind: SignatureTokenKind.MutableReference, referent }
	},
	reference(referent: SignatureToken): ReferenceToken {
		return { kind: SignatureTokenKind.Reference, referent }
	},
	signer: { kind: SignatureTokenKind.Signer },
	struct(handle: StructHandleIndex, typeArguments?: readonly SignatureToken[]): SignatureToken {
		if (typeArguments === undefined) return { handle, kind: SignatureTokenKind.Struct }
		return { handle, kind: SignatureTokenKind.StructInstantiation, typeArguments }
	},
	typeParameter(index: number): TypeParameterToken {
		return { index, kind: SignatureTokenKind.TypeParameter }
	},
	u128: { kind: SignatureTokenKind.U128 },
	u64: { kind: SignatureTokenKind.U64 },
	u8: { kind: SignatureTokenKind.U8 },
	vector(element: SignatureToken): VectorToken {
		return { element, kind: SignatureTokenKind.Vector }
	},
} as const
