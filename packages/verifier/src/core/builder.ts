/**
 * Append-only module assembly.
 *
 * Each `add*` call appends one entry and hands back its index, the same way
 * the dense stores elsewhere hand out IDs. Nothing is deduplicated: a builder
 * must be able to express the malformed modules the verifier rejects.
 */

import { canonicalAddress } from './address.ts'
import {
	type ConstantPoolIndex,
	constantPoolIndex,
	type FieldHandleIndex,
	type FieldInstantiationIndex,
	type FunctionDefinitionIndex,
	type FunctionHandleIndex,
	type FunctionInstantiationIndex,
	fieldHandleIndex,
	fieldInstantiationIndex,
	functionDefinitionIndex,
	functionHandleIndex,
	functionInstantiationIndex,
	type IdentifierIndex,
	identifierIndex,
	type ModuleHandleIndex,
	moduleHandleIndex,
	type SignatureIndex,
	type StructDefInstantiationIndex,
	type StructDefinitionIndex,
	type StructHandleIndex,
	signatureIndex,
	structDefInstantiationIndex,
	structDefinitionIndex,
	structHandleIndex,
} from './indices.ts'
import {
	CompiledModule,
	type Constant,
	type FieldDefinition,
	type FieldHandle,
	type FieldInstantiation,
	type FunctionDefinition,
	type FunctionHandle,
	type FunctionInstantiation,
	type Kind,
	type ModuleHandle,
	type StructDefInstantiation,
	type StructDefinition,
	type StructHandle,
} from './module.ts'
import type { SignatureToken } from './signature.ts'

export interface StructHandleInit {
	readonly module: ModuleHandleIndex
	readonly name: IdentifierIndex
	readonly isNominalResource?: boolean
	readonly typeParameters?: readonly Kind[]
}

export interface FunctionHandleInit {
	readonly module: ModuleHandleIndex
	readonly name: IdentifierIndex
	readonly parameters: SignatureIndex
	readonly returnType: SignatureIndex
	readonly typeParameters?: readonly Kind[]
}

export interface FunctionDefinitionInit {
	readonly function: FunctionHandleIndex
	readonly isPublic?: boolean
	readonly acquiresGlobalResources?: readonly StructDefinitionIndex[]
	/** Omit for an empty body with locals at signature 0; `null` for native */
	readonly code?: FunctionDefinition['code']
}

export class ModuleBuilder {
	private selfModuleHandle: ModuleHandleIndex = moduleHandleIndex(0)
	private readonly identifiers: string[] = []
	private readonly constantPool: Constant[] = []
	private readonly signatures: SignatureToken[][] = []
	private readonly moduleHandles: ModuleHandle[] = []
	private readonly structHandles: StructHandle[] = []
	private readonly functionHandles: FunctionHandle[] = []
	private readonly fieldHandles: FieldHandle[] = []
	private readonly structInstantiations: StructDefInstantiation[] = []
	private readonly functionInstantiations: FunctionInstantiation[] = []
	private readonly fieldInstantiations: FieldInstantiation[] = []
	private readonly structDefinitions: StructDefinition[] = []
	private readonly functionDefinitions: FunctionDefinition[] = []

	/** Append a name. The same name twice yields two indices. */
	identifier(name: string): IdentifierIndex {
		const id = identifierIndex(this.identifiers.length)
		this.identifiers.push(name)
		return id
	}

	addConstant(type: SignatureToken, data: Uint8Array | readonly number[]): ConstantPoolIndex {
		const id = constantPoolIndex(this.constantPool.length)
		this.constantPool.push({ data: Uint8Array.from(data), type })
		return id
	}

	addSignature(tokens: readonly SignatureToken[]): SignatureIndex {
		const id = signatureIndex(this.signatures.length)
		this.signatures.push([...tokens])
		return id
	}

	/** The address is stored in canonical form; see `canonicalAddress`. */
	addModuleHandle(address: string, name: IdentifierIndex): ModuleHandleIndex {
		const canonical = canonicalAddress(address)
		if (canonical === null) {
			throw new Error(`Invalid address: ${address}`)
		}
		const id = moduleHandleIndex(this.moduleHandles.length)
		this.moduleHandles.push({ address: canonical, name })
		return id
	}

	/**
	 * Add a module handle and designate it as the module being built.
	 */
	addSelfModuleHandle(address: string, name: IdentifierIndex): ModuleHandleIndex {
		const id = this.addModuleHandle(address, name)
		this.selfModuleHandle = id
		return id
	}

	setSelfModuleHandle(id: ModuleHandleIndex): this {
		this.selfModuleHandle = id
		return this
	}

	addStructHandle(init: StructHandleInit): StructHandleIndex {
		const id = structHandleIndex(this.structHandles.length)
		this.structHandles.push({
			isNominalResource: init.isNominalResource ?? false,
			module: init.module,
			name: init.name,
			typeParameters: init.typeParameters ?? [],
		})
		return id
	}

	addFunctionHandle(init: FunctionHandleInit): FunctionHandleIndex {
		const id = functionHandleIndex(this.functionHandles.length)
		this.functionHandles.push({
			module: init.module,
			name: init.name,
			parameters: init.parameters,
			returnType: init.returnType,
			typeParameters: init.typeParameters ?? [],
		})
		return id
	}

	addFieldHandle(owner: StructDefinitionIndex, field: number): FieldHandleIndex {
		const id = fieldHandleIndex(this.fieldHandles.length)
		this.fieldHandles.push({ field, owner })
		return id
	}

	addStructInstantiation(
		def: StructDefinitionIndex,
		typeParameters: SignatureIndex
	): StructDefInstantiationIndex {
		const id = structDefInstantiationIndex(this.structInstantiations.length)
		this.structInstantiations.push({ def, typeParameters })
		return id
	}

	addFunctionInstantiation(
		handle: FunctionHandleIndex,
		typeParameters: SignatureIndex
	): FunctionInstantiationIndex {
		const id = functionInstantiationIndex(this.functionInstantiations.length)
		this.functionInstantiations.push({ handle, typeParameters })
		return id
	}

	addFieldInstantiation(
		handle: FieldHandleIndex,
		typeParameters: SignatureIndex
	): FieldInstantiationIndex {
		const id = fieldInstantiationIndex(this.fieldInstantiations.length)
		this.fieldInstantiations.push({ handle, typeParameters })
		return id
	}

	addStructDefinition(
		structHandle: StructHandleIndex,
		fields: readonly FieldDefinition[]
	): StructDefinitionIndex {
		const id = structDefinitionIndex(this.structDefinitions.length)
		this.structDefinitions.push({
			fieldInformation: { fields: [...fields], kind: 'declared' },
			structHandle,
		})
		return id
	}

	addNativeStructDefinition(structHandle: StructHandleIndex): StructDefinitionIndex {
		const id = structDefinitionIndex(this.structDefinitions.length)
		this.structDefinitions.push({ fieldInformation: { kind: 'native' }, structHandle })
		return id
	}

	addFunctionDefinition(init: FunctionDefinitionInit): FunctionDefinitionIndex {
		const id = functionDefinitionIndex(this.functionDefinitions.length)
		this.functionDefinitions.push({
			acquiresGlobalResources: [...(init.acquiresGlobalResources ?? [])],
			code: init.code === undefined ? { code: [], locals: signatureIndex(0) } : init.code,
			function: init.function,
			isPublic: init.isPublic ?? false,
		})
		return id
	}

	build(): CompiledModule {
		return new CompiledModule({
			constantPool: this.constantPool,
			fieldHandles: this.fieldHandles,
			fieldInstantiations: this.fieldInstantiations,
			functionDefinitions: this.functionDefinitions,
			functionHandles: this.functionHandles,
			functionInstantiations: this.functionInstantiations,
			identifiers: this.identifiers,
			moduleHandles: this.moduleHandles,
			selfModuleHandle: this.selfModuleHandle,
			signatures: this.signatures.map((tokens) => ({ tokens })),
			structDefinitions: this.structDefinitions,
			structHandles: this.structHandles,
			structInstantiations: this.structInstantiations,
		})
	}
}
