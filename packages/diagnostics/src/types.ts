/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Catalog entry. `message`, `description` and `suggestion` may hold `{key}` placeholders.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>

/**
 * A catalog entry bound to concrete arguments.
 */
export interface RenderedDiagnostic {
	readonly def: DiagnosticDef
	/** Interpolated message */
	readonly message: string
	/** Interpolated suggestion, when the definition has one */
	readonly suggestion?: string
	readonly args?: DiagnosticArgs
}
