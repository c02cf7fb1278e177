import {
	formatDiagnostic,
	MGCLI001,
	MGCLI002,
	MGCLI003,
	MGCLI004,
} from '@modguard/diagnostics'
import {
	formatViolation,
	indexKindName,
	ModuleFormatError,
	type VerifyResult,
} from '@modguard/verifier'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnostic(MGCLI001, { path: filePath })
	}
	return formatDiagnostic(MGCLI002, { reason: getErrorMessage(error) })
}

export function formatLoadError(filePath: string, error: unknown): string {
	if (error instanceof ModuleFormatError) {
		return formatDiagnostic(MGCLI003, { path: filePath, reason: error.message })
	}
	return formatDiagnostic(MGCLI004, { reason: getErrorMessage(error) })
}

export function formatResult(filePath: string, result: VerifyResult): string {
	return result.valid ? `${filePath}: ok` : `${filePath}: ${formatViolation(result.violation)}`
}

/**
 * Machine-readable result. Tables are named rather than numbered.
 */
export function resultToJson(result: VerifyResult): string {
	if (result.valid) return JSON.stringify({ valid: true })
	const { index, indexKind, status } = result.violation
	return JSON.stringify({
		valid: false,
		violation: { index, status, table: indexKindName(indexKind) },
	})
}
