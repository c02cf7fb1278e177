import { ModuleBuilder } from '../src/core/builder.ts'
import type {
	FunctionHandleIndex,
	IdentifierIndex,
	ModuleHandleIndex,
	SignatureIndex,
	StructDefinitionIndex,
	StructHandleIndex,
} from '../src/core/indices.ts'
import { Type } from '../src/core/signature.ts'

export interface MinimalModule {
	readonly builder: ModuleBuilder
	readonly self: ModuleHandleIndex
	/** The empty signature `()` at index 0 */
	readonly empty: SignatureIndex
	readonly structName: IdentifierIndex
	readonly fieldName: IdentifierIndex
	readonly functionName: IdentifierIndex
	readonly struct: StructHandleIndex
	readonly structDef: StructDefinitionIndex
	readonly fn: FunctionHandleIndex
}

/**
 * Smallest well-formed module: one self struct with one field, one self
 * function with an empty body, nothing acquired.
 *
 * Identifiers are `["M", "S", "x", "f"]`. Tests append to the returned
 * builder to introduce exactly one defect.
 */
export function minimalModule(): MinimalModule {
	const builder = new ModuleBuilder()
	const moduleName = builder.identifier('M')
	const structName = builder.identifier('S')
	const fieldName = builder.identifier('x')
	const functionName = builder.identifier('f')
	const self = builder.addSelfModuleHandle('0x1', moduleName)
	const empty = builder.addSignature([])
	const struct = builder.addStructHandle({ module: self, name: structName })
	const structDef = builder.addStructDefinition(struct, [{ name: fieldName, signature: Type.u64 }])
	const fn = builder.addFunctionHandle({
		module: self,
		name: functionName,
		parameters: empty,
		returnType: empty,
	})
	builder.addFunctionDefinition({ function: fn })
	return { builder, empty, fieldName, fn, functionName, self, struct, structDef, structName }
}
