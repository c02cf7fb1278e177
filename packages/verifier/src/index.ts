/**
 * modguard verifier public API
 *
 * - Dense, index-addressed module tables with branded index types
 * - Append-only ModuleBuilder and a JSON loader producing CompiledModule
 * - `verify`: table uniqueness, ownership and totality checks
 */

export { assertVerified, MODULE_CHECKS, type ModuleCheck, verify } from './check/duplication.ts'
export { firstDuplicateElement } from './check/duplicates.ts'
export {
	bytesToHex,
	constantKey,
	fieldHandleKey,
	fieldInstantiationKey,
	functionHandleKey,
	functionInstantiationKey,
	moduleHandleKey,
	signatureKey,
	signatureTokenKey,
	structHandleKey,
	structInstantiationKey,
} from './check/keys.ts'
export {
	formatViolation,
	StatusCode,
	statusDiagnostic,
	VerificationError,
	type VerifyResult,
	type Violation,
	violation,
	violationDiagnostic,
} from './check/violation.ts'
export { ADDRESS_LENGTH, canonicalAddress } from './core/address.ts'
export {
	type FunctionDefinitionInit,
	type FunctionHandleInit,
	ModuleBuilder,
	type StructHandleInit,
} from './core/builder.ts'
export {
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
	IndexKind,
	identifierIndex,
	indexKindName,
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
} from './core/indices.ts'
export {
	type CodeUnit,
	CompiledModule,
	type Constant,
	type FieldDefinition,
	type FieldHandle,
	type FieldInstantiation,
	type FunctionDefinition,
	type FunctionHandle,
	type FunctionInstantiation,
	Kind,
	type ModuleHandle,
	type ModuleTables,
	type Signature,
	type StructDefInstantiation,
	type StructDefinition,
	type StructFieldInformation,
	type StructHandle,
} from './core/module.ts'
export {
	type SignatureToken,
	SignatureTokenKind,
	Type,
} from './core/signature.ts'
export { loadModuleJson, ModuleFormatError, moduleFromJson } from './load/json.ts'
