import type { DiagnosticArgs, DiagnosticDef, RenderedDiagnostic } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys are left as-is.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/**
 * Bind a definition to its arguments.
 */
export function renderDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): RenderedDiagnostic {
	return {
		def,
		message: interpolateMessage(def.message, args),
		...(def.suggestion !== undefined
			? { suggestion: interpolateMessage(def.suggestion, args) }
			: {}),
		...(args ? { args } : {}),
	}
}

/**
 * Single-line form used by the CLI: `[CODE] message`.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
