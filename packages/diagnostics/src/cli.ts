/**
 * CLI diagnostic definitions.
 *
 * Error code format: MGCLI<NUMBER>
 * - MGCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (MGCLI001-099)
// =============================================================================

export const MGCLI001: DiagnosticDef = {
	code: 'MGCLI001',
	description: "modguard couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const MGCLI002: DiagnosticDef = {
	code: 'MGCLI002',
	description: "The file exists but modguard can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const MGCLI003: DiagnosticDef = {
	code: 'MGCLI003',
	description: "The file isn't a well-formed module description, so it never reached the verifier.",
	message: 'invalid module file: {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Fix the reported field and run the command again.',
}

export const MGCLI004: DiagnosticDef = {
	code: 'MGCLI004',
	description: 'Something unexpected went wrong during verification.',
	message: 'verification failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your module file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	MGCLI001,
	MGCLI002,
	MGCLI003,
	MGCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
