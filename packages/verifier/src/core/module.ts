/**
 * In-memory module representation.
 *
 * A module is a set of dense, index-addressed tables. The representation is
 * read-only once built: checks borrow it and never write to it.
 */

import type {
	FieldHandleIndex,
	FunctionDefinitionIndex,
	FunctionHandleIndex,
	IdentifierIndex,
	ModuleHandleIndex,
	SignatureIndex,
	StructDefinitionIndex,
	StructHandleIndex,
} from './indices.ts'
import type { SignatureToken } from './signature.ts'

/**
 * Constraint on a generic type parameter.
 */
export const Kind = {
	All: 0,
	Copyable: 2,
	Resource: 1,
} as const

export type Kind = (typeof Kind)[keyof typeof Kind]

export interface Constant {
	readonly type: SignatureToken
	/** Serialized value */
	readonly data: Uint8Array
}

export interface Signature {
	readonly tokens: readonly SignatureToken[]
}

export interface ModuleHandle {
	/** Canonical hex account address, e.g. `0x1` */
	readonly address: string
	readonly name: IdentifierIndex
}

export interface StructHandle {
	readonly module: ModuleHandleIndex
	readonly name: IdentifierIndex
	readonly isNominalResource: boolean
	readonly typeParameters: readonly Kind[]
}

export interface FunctionHandle {
	readonly module: ModuleHandleIndex
	readonly name: IdentifierIndex
	readonly parameters: SignatureIndex
	readonly returnType: SignatureIndex
	readonly typeParameters: readonly Kind[]
}

export interface FieldHandle {
	readonly owner: StructDefinitionIndex
	/** Position of the field in the owner's declared field list */
	readonly field: number
}

export interface StructDefInstantiation {
	readonly def: StructDefinitionIndex
	readonly typeParameters: SignatureIndex
}

export interface FunctionInstantiation {
	readonly handle: FunctionHandleIndex
	readonly typeParameters: SignatureIndex
}

export interface FieldInstantiation {
	readonly handle: FieldHandleIndex
	readonly typeParameters: SignatureIndex
}

export interface FieldDefinition {
	readonly name: IdentifierIndex
	readonly signature: SignatureToken
}

export type StructFieldInformation =
	| { readonly kind: 'native' }
	| { readonly kind: 'declared'; readonly fields: readonly FieldDefinition[] }

export interface StructDefinition {
	readonly structHandle: StructHandleIndex
	readonly fieldInformation: StructFieldInformation
}

/**
 * Function body. The instruction stream is opaque here.
 */
export interface CodeUnit {
	readonly locals: SignatureIndex
	readonly code: readonly number[]
}

export interface FunctionDefinition {
	readonly function: FunctionHandleIndex
	readonly isPublic: boolean
	/** Struct definitions this function may access in global storage */
	readonly acquiresGlobalResources: readonly StructDefinitionIndex[]
	/** `null` for native functions */
	readonly code: CodeUnit | null
}

/**
 * Raw table contents of a module.
 */
export interface ModuleTables {
	readonly selfModuleHandle: ModuleHandleIndex
	readonly identifiers: readonly string[]
	readonly constantPool: readonly Constant[]
	readonly signatures: readonly Signature[]
	readonly moduleHandles: readonly ModuleHandle[]
	readonly structHandles: readonly StructHandle[]
	readonly functionHandles: readonly FunctionHandle[]
	readonly fieldHandles: readonly FieldHandle[]
	readonly structInstantiations: readonly StructDefInstantiation[]
	readonly functionInstantiations: readonly FunctionInstantiation[]
	readonly fieldInstantiations: readonly FieldInstantiation[]
	readonly structDefinitions: readonly StructDefinition[]
	readonly functionDefinitions: readonly FunctionDefinition[]
}

function entryAt<T>(table: readonly T[], index: number, indexType: string): T {
	const entry = table[index]
	if (entry === undefined) {
		throw new Error(`Invalid ${indexType}: ${index}`)
	}
	return entry
}

/**
 * A deserialized module.
 *
 * Tables are exposed as read-only arrays in definition order. The `*At`
 * accessors throw on an out-of-range index; raw indices are expected to have
 * been bounds-checked by whatever produced the module.
 */
export class CompiledModule implements ModuleTables {
	readonly selfModuleHandle: ModuleHandleIndex
	readonly identifiers: readonly string[]
	readonly constantPool: readonly Constant[]
	readonly signatures: readonly Signature[]
	readonly moduleHandles: readonly ModuleHandle[]
	readonly structHandles: readonly StructHandle[]
	readonly functionHandles: readonly FunctionHandle[]
	readonly fieldHandles: readonly FieldHandle[]
	readonly structInstantiations: readonly StructDefInstantiation[]
	readonly functionInstantiations: readonly FunctionInstantiation[]
	readonly fieldInstantiations: readonly FieldInstantiation[]
	readonly structDefinitions: readonly StructDefinition[]
	readonly functionDefinitions: readonly FunctionDefinition[]

	constructor(tables: ModuleTables) {
		this.selfModuleHandle = tables.selfModuleHandle
		this.identifiers = Object.freeze([...tables.identifiers])
		this.constantPool = Object.freeze([...tables.constantPool])
		this.signatures = Object.freeze([...tables.signatures])
		this.moduleHandles = Object.freeze([...tables.moduleHandles])
		this.structHandles = Object.freeze([...tables.structHandles])
		this.functionHandles = Object.freeze([...tables.functionHandles])
		this.fieldHandles = Object.freeze([...tables.fieldHandles])
		this.structInstantiations = Object.freeze([...tables.structInstantiations])
		this.functionInstantiations = Object.freeze([...tables.functionInstantiations])
		this.fieldInstantiations = Object.freeze([...tables.fieldInstantiations])
		this.structDefinitions = Object.freeze([...tables.structDefinitions])
		this.functionDefinitions = Object.freeze([...tables.functionDefinitions])
	}

	identifierAt(index: IdentifierIndex): string {
		return entryAt(this.identifiers, index, 'IdentifierIndex')
	}

	moduleHandleAt(index: ModuleHandleIndex): ModuleHandle {
		return entryAt(this.moduleHandles, index, 'ModuleHandleIndex')
	}

	structHandleAt(index: StructHandleIndex): StructHandle {
		return entryAt(this.structHandles, index, 'StructHandleIndex')
	}

	functionHandleAt(index: FunctionHandleIndex): FunctionHandle {
		return entryAt(this.functionHandles, index, 'FunctionHandleIndex')
	}

	functionDefinitionAt(index: FunctionDefinitionIndex): FunctionDefinition {
		return entryAt(this.functionDefinitions, index, 'FunctionDefinitionIndex')
	}

	/** The module handle naming this module. */
	selfHandle(): ModuleHandle {
		return this.moduleHandleAt(this.selfModuleHandle)
	}

	/** Name of this module, resolved through the self handle. */
	name(): string {
		return this.identifierAt(this.selfHandle().name)
	}
}
