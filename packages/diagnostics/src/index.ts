/**
 * @modguard/diagnostics
 *
 * Shared diagnostic types and definitions for modguard packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	MGCLI001,
	MGCLI002,
	MGCLI003,
	MGCLI004,
} from './cli.ts'
export { formatDiagnostic, interpolateMessage, renderDiagnostic } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	type RenderedDiagnostic,
} from './types.ts'
export {
	MGCHECK001,
	MGCHECK002,
	MGCHECK003,
	MGCHECK004,
	MGCHECK005,
	VERIFIER_DIAGNOSTICS,
	type VerifierDiagnosticCode,
} from './verifier.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { VERIFIER_DIAGNOSTICS } from './verifier.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...VERIFIER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
