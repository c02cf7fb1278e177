/**
 * Module consistency check.
 *
 * Verifies that every table holds distinct entries, so that an index names
 * exactly one entry, and additionally that:
 * - struct definitions declare fields with distinct names (unless native)
 * - function acquires lists hold distinct struct definitions
 * - every definition implements a handle owned by the self module
 * - every handle owned by the self module has a definition
 *
 * Checks run in a fixed order and the first violation wins. Later checks rely
 * on earlier ones: once the definition tables are duplicate-free, handle
 * membership can be tested directly.
 */

import {
	type FunctionHandleIndex,
	functionHandleIndex,
	IndexKind,
	type StructHandleIndex,
	structHandleIndex,
} from '../core/indices.ts'
import type { CompiledModule } from '../core/module.ts'
import { firstDuplicateElement } from './duplicates.ts'
import {
	constantKey,
	fieldHandleKey,
	fieldInstantiationKey,
	functionHandleKey,
	functionInstantiationKey,
	moduleHandleKey,
	signatureKey,
	structHandleKey,
	structInstantiationKey,
} from './keys.ts'
import {
	StatusCode,
	VerificationError,
	type Violation,
	type VerifyResult,
	violation,
} from './violation.ts'

/**
 * One step of the check. Returns the violation it found, or `null`.
 */
export type ModuleCheck = (module: CompiledModule) => Violation | null

function duplicateIn(indexKind: IndexKind, position: number | null): Violation | null {
	return position === null ? null : violation(indexKind, position, StatusCode.DuplicateElement)
}

// =============================================================================
// TABLE UNIQUENESS
// =============================================================================

export const checkIdentifiers: ModuleCheck = (m) =>
	duplicateIn(IndexKind.Identifier, firstDuplicateElement(m.identifiers))

export const checkConstantPool: ModuleCheck = (m) =>
	duplicateIn(IndexKind.ConstantPool, firstDuplicateElement(m.constantPool, constantKey))

export const checkSignatures: ModuleCheck = (m) =>
	duplicateIn(IndexKind.Signature, firstDuplicateElement(m.signatures, signatureKey))

export const checkModuleHandles: ModuleCheck = (m) =>
	duplicateIn(IndexKind.ModuleHandle, firstDuplicateElement(m.moduleHandles, moduleHandleKey))

export const checkStructHandles: ModuleCheck = (m) =>
	duplicateIn(IndexKind.StructHandle, firstDuplicateElement(m.structHandles, structHandleKey))

export const checkFunctionHandles: ModuleCheck = (m) =>
	duplicateIn(
		IndexKind.FunctionHandle,
		firstDuplicateElement(m.functionHandles, functionHandleKey)
	)

export const checkFieldHandles: ModuleCheck = (m) =>
	duplicateIn(IndexKind.FieldHandle, firstDuplicateElement(m.fieldHandles, fieldHandleKey))

export const checkStructInstantiations: ModuleCheck = (m) =>
	duplicateIn(
		IndexKind.StructDefInstantiation,
		firstDuplicateElement(m.structInstantiations, structInstantiationKey)
	)

export const checkFunctionInstantiations: ModuleCheck = (m) =>
	duplicateIn(
		IndexKind.FunctionInstantiation,
		firstDuplicateElement(m.functionInstantiations, functionInstantiationKey)
	)

export const checkFieldInstantiations: ModuleCheck = (m) =>
	duplicateIn(
		IndexKind.FieldInstantiation,
		firstDuplicateElement(m.fieldInstantiations, fieldInstantiationKey)
	)

/** At most one definition per struct handle. */
export const checkStructDefinitions: ModuleCheck = (m) =>
	duplicateIn(
		IndexKind.StructDefinition,
		firstDuplicateElement(m.structDefinitions, (def) => def.structHandle)
	)

/** At most one definition per function handle. */
export const checkFunctionDefinitions: ModuleCheck = (m) =>
	duplicateIn(
		IndexKind.FunctionDefinition,
		firstDuplicateElement(m.functionDefinitions, (def) => def.function)
	)

// =============================================================================
// DEFINITION CONTENTS
// =============================================================================

export const checkAcquires: ModuleCheck = (m) => {
	for (const [i, def] of m.functionDefinitions.entries()) {
		if (firstDuplicateElement(def.acquiresGlobalResources) !== null) {
			return violation(IndexKind.FunctionDefinition, i, StatusCode.DuplicateAcquiresAnnotation)
		}
	}
	return null
}

/**
 * Native structs are skipped. The reported field index is relative to its struct.
 */
export const checkFields: ModuleCheck = (m) => {
	for (const [i, def] of m.structDefinitions.entries()) {
		const info = def.fieldInformation
		if (info.kind === 'native') continue
		if (info.fields.length === 0) {
			return violation(IndexKind.StructDefinition, i, StatusCode.ZeroSizedStruct)
		}
		const field = firstDuplicateElement(info.fields, (f) => f.name)
		if (field !== null) {
			return violation(IndexKind.FieldDefinition, field, StatusCode.DuplicateElement)
		}
	}
	return null
}

// =============================================================================
// OWNERSHIP
// =============================================================================

export const checkStructOwners: ModuleCheck = (m) => {
	const index = m.structDefinitions.findIndex(
		(def) => m.structHandleAt(def.structHandle).module !== m.selfModuleHandle
	)
	return index === -1
		? null
		: violation(IndexKind.StructDefinition, index, StatusCode.InvalidModuleOwner)
}

export const checkFunctionOwners: ModuleCheck = (m) => {
	const index = m.functionDefinitions.findIndex(
		(def) => m.functionHandleAt(def.function).module !== m.selfModuleHandle
	)
	return index === -1
		? null
		: violation(IndexKind.FunctionDefinition, index, StatusCode.InvalidModuleOwner)
}

// =============================================================================
// TOTALITY
// =============================================================================

export const checkStructsImplemented: ModuleCheck = (m) => {
	const implemented = new Set<StructHandleIndex>(m.structDefinitions.map((d) => d.structHandle))
	for (let i = 0; i < m.structHandles.length; i++) {
		const handle = structHandleIndex(i)
		if (m.structHandleAt(handle).module === m.selfModuleHandle && !implemented.has(handle)) {
			return violation(IndexKind.StructHandle, i, StatusCode.UnimplementedHandle)
		}
	}
	return null
}

export const checkFunctionsImplemented: ModuleCheck = (m) => {
	const implemented = new Set<FunctionHandleIndex>(m.functionDefinitions.map((d) => d.function))
	for (let i = 0; i < m.functionHandles.length; i++) {
		const handle = functionHandleIndex(i)
		if (m.functionHandleAt(handle).module === m.selfModuleHandle && !implemented.has(handle)) {
			return violation(IndexKind.FunctionHandle, i, StatusCode.UnimplementedHandle)
		}
	}
	return null
}

// =============================================================================
// DRIVER
// =============================================================================

/**
 * Every check, in the order it runs.
 */
export const MODULE_CHECKS: readonly ModuleCheck[] = [
	checkIdentifiers,
	checkConstantPool,
	checkSignatures,
	checkModuleHandles,
	checkStructHandles,
	checkFunctionHandles,
	checkFieldHandles,
	checkStructInstantiations,
	checkFunctionInstantiations,
	checkFieldInstantiations,
	checkStructDefinitions,
	checkFunctionDefinitions,
	checkAcquires,
	checkFields,
	checkStructOwners,
	checkFunctionOwners,
	checkStructsImplemented,
	checkFunctionsImplemented,
]

/**
 * Run every check against `module` and return the first violation, if any.
 * Never mutates the module.
 */
export function verify(module: CompiledModule): VerifyResult {
	for (const check of MODULE_CHECKS) {
		const found = check(module)
		if (found !== null) return { valid: false, violation: found }
	}
	return { valid: true }
}

/**
 * Like `verify`, but throws `VerificationError` on the first violation.
 */
export function assertVerified(module: CompiledModule): void {
	const result = verify(module)
	if (!result.valid) throw new VerificationError(result.violation)
}
