/**
 * Verifier diagnostic definitions.
 *
 * Error code format: MG<PHASE><NUMBER>
 * - MGCHECK: Module consistency errors (001-099)
 *
 * Every code corresponds to exactly one verifier status code.
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CONSISTENCY ERRORS (MGCHECK001-099)
// =============================================================================

export const MGCHECK001: DiagnosticDef = {
	code: 'MGCHECK001',
	description:
		'Two entries of the same table are equal, so an index into that table no longer names a single entry.',
	message: 'duplicate element in {table} at index {index}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the repeated entry and point its users at the first occurrence.',
}

export const MGCHECK002: DiagnosticDef = {
	code: 'MGCHECK002',
	description: 'A function lists the same struct definition more than once in its acquires list.',
	message: 'duplicate acquires annotation in {table} at index {index}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'List each acquired struct definition once.',
}

export const MGCHECK003: DiagnosticDef = {
	code: 'MGCHECK003',
	description: 'A struct that is not native must declare at least one field.',
	message: 'zero sized struct in {table} at index {index}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare a field, or mark the struct as native.',
}

export const MGCHECK004: DiagnosticDef = {
	code: 'MGCHECK004',
	description: 'A definition can only implement a handle owned by the module being checked.',
	message: 'definition in {table} at index {index} is owned by another module',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Point the definition at a handle whose module is the self module handle.',
}

export const MGCHECK005: DiagnosticDef = {
	code: 'MGCHECK005',
	description: 'A handle owned by the module being checked has no definition.',
	message: 'unimplemented handle in {table} at index {index}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add exactly one definition for this handle.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all verifier diagnostics.
 */
export const VERIFIER_DIAGNOSTICS = {
	MGCHECK001,
	MGCHECK002,
	MGCHECK003,
	MGCHECK004,
	MGCHECK005,
} as const

/**
 * All valid verifier diagnostic codes.
 */
export type VerifierDiagnosticCode = keyof typeof VERIFIER_DIAGNOSTICS
