/**
 * Table indices.
 *
 * Every table in a module is a dense array addressed by a 0-based integer.
 * Each table gets its own branded index type so that a struct handle index
 * can't be passed where a function handle index is expected, while staying a
 * plain number at runtime.
 */

export type IdentifierIndex = number & { readonly __brand: 'IdentifierIndex' }
export type ConstantPoolIndex = number & { readonly __brand: 'ConstantPoolIndex' }
export type SignatureIndex = number & { readonly __brand: 'SignatureIndex' }
export type ModuleHandleIndex = number & { readonly __brand: 'ModuleHandleIndex' }
export type StructHandleIndex = number & { readonly __brand: 'StructHandleIndex' }
export type FunctionHandleIndex = number & { readonly __brand: 'FunctionHandleIndex' }
export type FieldHandleIndex = number & { readonly __brand: 'FieldHandleIndex' }
export type StructDefInstantiationIndex = number & {
	readonly __brand: 'StructDefInstantiationIndex'
}
export type FunctionInstantiationIndex = number & {
	readonly __brand: 'FunctionInstantiationIndex'
}
export type FieldInstantiationIndex = number & { readonly __brand: 'FieldInstantiationIndex' }
export type StructDefinitionIndex = number & { readonly __brand: 'StructDefinitionIndex' }
export type FunctionDefinitionIndex = number & { readonly __brand: 'FunctionDefinitionIndex' }

export function identifierIndex(n: number): IdentifierIndex {
	return n as IdentifierIndex
}

export function constantPoolIndex(n: number): ConstantPoolIndex {
	return n as ConstantPoolIndex
}

export function signatureIndex(n: number): SignatureIndex {
	return n as SignatureIndex
}

export function moduleHandleIndex(n: number): ModuleHandleIndex {
	return n as ModuleHandleIndex
}

export function structHandleIndex(n: number): StructHandleIndex {
	return n as StructHandleIndex
}

export function functionHandleIndex(n: number): FunctionHandleIndex {
	return n as FunctionHandleIndex
}

export function fieldHandleIndex(n: number): FieldHandleIndex {
	return n as FieldHandleIndex
}

export function structDefInstantiationIndex(n: number): StructDefInstantiationIndex {
	return n as StructDefInstantiationIndex
}

export function functionInstantiationIndex(n: number): FunctionInstantiationIndex {
	return n as FunctionInstantiationIndex
}

export function fieldInstantiationIndex(n: number): FieldInstantiationIndex {
	return n as FieldInstantiationIndex
}

export function structDefinitionIndex(n: number): StructDefinitionIndex {
	return n as StructDefinitionIndex
}

export function functionDefinitionIndex(n: number): FunctionDefinitionIndex {
	return n as FunctionDefinitionIndex
}

/**
 * Which table (or definition-owned list) a violation points into.
 */
export const IndexKind = {
	ConstantPool: 1,
	FieldDefinition: 11,
	FieldHandle: 6,
	FieldInstantiation: 9,
	FunctionDefinition: 12,
	FunctionHandle: 5,
	FunctionInstantiation: 8,
	Identifier: 0,
	ModuleHandle: 3,
	Signature: 2,
	StructDefinition: 10,
	StructDefInstantiation: 7,
	StructHandle: 4,
} as const

export type IndexKind = (typeof IndexKind)[keyof typeof IndexKind]

const INDEX_KIND_NAMES: Record<IndexKind, string> = {
	[IndexKind.Identifier]: 'Identifier',
	[IndexKind.ConstantPool]: 'ConstantPool',
	[IndexKind.Signature]: 'Signature',
	[IndexKind.ModuleHandle]: 'ModuleHandle',
	[IndexKind.StructHandle]: 'StructHandle',
	[IndexKind.FunctionHandle]: 'FunctionHandle',
	[IndexKind.FieldHandle]: 'FieldHandle',
	[IndexKind.StructDefInstantiation]: 'StructDefInstantiation',
	[IndexKind.FunctionInstantiation]: 'FunctionInstantiation',
	[IndexKind.FieldInstantiation]: 'FieldInstantiation',
	[IndexKind.StructDefinition]: 'StructDefinition',
	[IndexKind.FieldDefinition]: 'FieldDefinition',
	[IndexKind.FunctionDefinition]: 'FunctionDefinition',
}

export function indexKindName(kind: IndexKind): string {
	return INDEX_KIND_NAMES[kind]
}
