/**
 * Uniqueness keys.
 *
 * Each projection maps a table entry to a string whose equality is the
 * table's equality rule. Composite keys are built from a prefix-free encoding
 * so distinct entries never collide.
 */

import type {
	Constant,
	FieldHandle,
	FieldInstantiation,
	FunctionHandle,
	FunctionInstantiation,
	ModuleHandle,
	Signature,
	StructDefInstantiation,
	StructHandle,
} from '../core/module.ts'
import { type SignatureToken, SignatureTokenKind } from '../core/signature.ts'

export function signatureTokenKey(token: SignatureToken): string {
	switch (token.kind) {
		case SignatureTokenKind.Bool:
			return 'bool'
		case SignatureTokenKind.U8:
			return 'u8'
		case SignatureTokenKind.U64:
			return 'u64'
		case SignatureTokenKind.U128:
			return 'u128'
		case SignatureTokenKind.Address:
			return 'address'
		case SignatureTokenKind.Signer:
			return 'signer'
		case SignatureTokenKind.Vector:
			return `vector<${signatureTokenKey(token.element)}>`
		case SignatureTokenKind.Struct:
			return `struct#${token.handle}`
		case SignatureTokenKind.StructInstantiation:
			return `struct#${token.handle}<${token.typeArguments.map(signatureTokenKey).join(',')}>`
		case SignatureTokenKind.Reference:
			return `&${signatureTokenKey(token.referent)}`
		case SignatureTokenKind.MutableReference:
			return `&mut ${signatureTokenKey(token.referent)}`
		case SignatureTokenKind.TypeParameter:
			return `T${token.index}`
	}
}

export function signatureKey(signature: Signature): string {
	return `(${signature.tokens.map(signatureTokenKey).join(',')})`
}

export function bytesToHex(data: Uint8Array): string {
	let hex = ''
	for (const byte of data) {
		hex += byte.toString(16).padStart(2, '0')
	}
	return hex
}

export function constantKey(constant: Constant): string {
	return `${signatureTokenKey(constant.type)}=${bytesToHex(constant.data)}`
}

export function moduleHandleKey(handle: ModuleHandle): string {
	return `${handle.address}::${handle.name}`
}

/** Owner and name only; generic and resource metadata don't take part. */
export function structHandleKey(handle: StructHandle): string {
	return `${handle.module}:${handle.name}`
}

/** Owner and name only; signatures and type parameters don't take part. */
export function functionHandleKey(handle: FunctionHandle): string {
	return `${handle.module}:${handle.name}`
}

export function fieldHandleKey(handle: FieldHandle): string {
	return `${handle.owner}.${handle.field}`
}

export function structInstantiationKey(inst: StructDefInstantiation): string {
	return `${inst.def}<${inst.typeParameters}>`
}

export function functionInstantiationKey(inst: FunctionInstantiation): string {
	return `${inst.handle}<${inst.typeParameters}>`
}

export function fieldInstantiationKey(inst: FieldInstantiation): string {
	return `${inst.handle}<${inst.typeParameters}>`
}
