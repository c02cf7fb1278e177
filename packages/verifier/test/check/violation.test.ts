import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DiagnosticSeverity } from '@modguard/diagnostics'
import {
	formatViolation,
	StatusCode,
	statusDiagnostic,
	VerificationError,
	violation,
	violationDiagnostic,
} from '../../src/check/violation.ts'
import { IndexKind } from '../../src/core/indices.ts'

describe('check/violation', () => {
	describe('formatViolation', () => {
		it('should format each status with its table and index', () => {
			assert.strictEqual(
				formatViolation(violation(IndexKind.Identifier, 2, StatusCode.DuplicateElement)),
				'[MGCHECK001] duplicate element in Identifier at index 2'
			)
			assert.strictEqual(
				formatViolation(
					violation(IndexKind.FunctionDefinition, 0, StatusCode.DuplicateAcquiresAnnotation)
				),
				'[MGCHECK002] duplicate acquires annotation in FunctionDefinition at index 0'
			)
			assert.strictEqual(
				formatViolation(violation(IndexKind.StructDefinition, 3, StatusCode.ZeroSizedStruct)),
				'[MGCHECK003] zero sized struct in StructDefinition at index 3'
			)
			assert.strictEqual(
				formatViolation(violation(IndexKind.StructDefinition, 1, StatusCode.InvalidModuleOwner)),
				'[MGCHECK004] definition in StructDefinition at index 1 is owned by another module'
			)
			assert.strictEqual(
				formatViolation(violation(IndexKind.FunctionHandle, 4, StatusCode.UnimplementedHandle)),
				'[MGCHECK005] unimplemented handle in FunctionHandle at index 4'
			)
		})
	})

	describe('statusDiagnostic', () => {
		it('should map every status to a distinct error', () => {
			const defs = Object.values(StatusCode).map(statusDiagnostic)
			assert.strictEqual(new Set(defs.map((d) => d.code)).size, defs.length)
			for (const def of defs) {
				assert.strictEqual(def.severity, DiagnosticSeverity.Error)
			}
		})
	})

	describe('violationDiagnostic', () => {
		it('should carry the arguments and suggestion', () => {
			const rendered = violationDiagnostic(
				violation(IndexKind.FieldDefinition, 2, StatusCode.DuplicateElement)
			)
			assert.strictEqual(rendered.def.code, 'MGCHECK001')
			assert.strictEqual(rendered.message, 'duplicate element in FieldDefinition at index 2')
			assert.strictEqual(
				rendered.suggestion,
				'Remove the repeated entry and point its users at the first occurrence.'
			)
			assert.deepStrictEqual(rendered.args, { index: 2, table: 'FieldDefinition' })
		})
	})

	describe('VerificationError', () => {
		it('should keep the violation', () => {
			const v = violation(IndexKind.StructHandle, 0, StatusCode.UnimplementedHandle)
			const error = new VerificationError(v)
			assert.ok(error instanceof Error)
			assert.strictEqual(error.name, 'VerificationError')
			assert.strictEqual(error.violation, v)
			assert.strictEqual(error.message, '[MGCHECK005] unimplemented handle in StructHandle at index 0')
		})
	})
})
