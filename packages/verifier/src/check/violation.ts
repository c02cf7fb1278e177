/**
 * Verification outcomes.
 */

import {
	type DiagnosticDef,
	formatDiagnostic,
	MGCHECK001,
	MGCHECK002,
	MGCHECK003,
	MGCHECK004,
	MGCHECK005,
	type RenderedDiagnostic,
	renderDiagnostic,
} from '@modguard/diagnostics'
import { IndexKind, indexKindName } from '../core/indices.ts'

/**
 * Why a module was rejected. One code per invariant.
 */
export const StatusCode = {
	DuplicateAcquiresAnnotation: 'DuplicateAcquiresAnnotation',
	DuplicateElement: 'DuplicateElement',
	InvalidModuleOwner: 'InvalidModuleOwner',
	UnimplementedHandle: 'UnimplementedHandle',
	ZeroSizedStruct: 'ZeroSizedStruct',
} as const

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode]

/**
 * The first structural defect found in a module.
 */
export interface Violation {
	/** Table (or definition-owned list) the offending entry lives in */
	readonly indexKind: IndexKind
	/** 0-based position of the offending entry */
	readonly index: number
	readonly status: StatusCode
}

export type VerifyResult =
	| { readonly valid: true }
	| { readonly valid: false; readonly violation: Violation }

export function violation(indexKind: IndexKind, index: number, status: StatusCode): Violation {
	return { index, indexKind, status }
}

const STATUS_DIAGNOSTICS: Record<StatusCode, DiagnosticDef> = {
	[StatusCode.DuplicateElement]: MGCHECK001,
	[StatusCode.DuplicateAcquiresAnnotation]: MGCHECK002,
	[StatusCode.ZeroSizedStruct]: MGCHECK003,
	[StatusCode.InvalidModuleOwner]: MGCHECK004,
	[StatusCode.UnimplementedHandle]: MGCHECK005,
}

export function statusDiagnostic(status: StatusCode): DiagnosticDef {
	return STATUS_DIAGNOSTICS[status]
}

export function violationDiagnostic(v: Violation): RenderedDiagnostic {
	return renderDiagnostic(statusDiagnostic(v.status), {
		index: v.index,
		table: indexKindName(v.indexKind),
	})
}

/**
 * `[MGCHECK001] duplicate element in Identifier at index 2`
 */
export function formatViolation(v: Violation): string {
	return formatDiagnostic(statusDiagnostic(v.status), {
		index: v.index,
		table: indexKindName(v.indexKind),
	})
}

/**
 * Thrown by `assertVerified` for callers that treat rejection as exceptional.
 */
export class VerificationError extends Error {
	readonly violation: Violation

	constructor(v: Violation) {
		super(formatViolation(v))
		this.name = 'VerificationError'
		this.violation = v
	}
}
