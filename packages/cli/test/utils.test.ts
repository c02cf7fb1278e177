import assert from 'node:assert'
import { describe, it } from 'node:test'
import { IndexKind, ModuleFormatError, StatusCode, violation } from '@modguard/verifier'
import {
	formatLoadError,
	formatReadError,
	formatResult,
	getErrorMessage,
	isNodeError,
	resultToJson,
} from '../src/utils.ts'

function nodeError(message: string, code: string): NodeJS.ErrnoException {
	return Object.assign(new Error(message), { code })
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(nodeError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should report a missing file with its path', () => {
		const result = formatReadError('/path/to/module.json', nodeError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[MGCLI001] file not found: /path/to/module.json')
	})

	it('should report other errors with their message', () => {
		const result = formatReadError('/path/to/module.json', nodeError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[MGCLI002] cannot read file: permission denied')
	})

	it('should handle plain Error', () => {
		const result = formatReadError('/path/to/module.json', new Error('unknown error'))
		assert.strictEqual(result, '[MGCLI002] cannot read file: unknown error')
	})
})

describe('formatLoadError', () => {
	it('should report format errors with their location', () => {
		const error = new ModuleFormatError('identifiers[0]', 'expected a string')
		assert.strictEqual(
			formatLoadError('module.json', error),
			'[MGCLI003] invalid module file: module.json: identifiers[0]: expected a string'
		)
	})

	it('should wrap anything else as an unexpected failure', () => {
		assert.strictEqual(
			formatLoadError('module.json', new Error('boom')),
			'[MGCLI004] verification failed: boom'
		)
	})
})

describe('formatResult', () => {
	it('should report success', () => {
		assert.strictEqual(formatResult('module.json', { valid: true }), 'module.json: ok')
	})

	it('should report the violation', () => {
		const result = {
			valid: false,
			violation: violation(IndexKind.Identifier, 2, StatusCode.DuplicateElement),
		} as const
		assert.strictEqual(
			formatResult('module.json', result),
			'module.json: [MGCHECK001] duplicate element in Identifier at index 2'
		)
	})
})

describe('resultToJson', () => {
	it('should serialize success', () => {
		assert.strictEqual(resultToJson({ valid: true }), '{"valid":true}')
	})

	it('should name the table of a violation', () => {
		const result = {
			valid: false,
			violation: violation(IndexKind.FieldDefinition, 2, StatusCode.DuplicateElement),
		} as const
		assert.strictEqual(
			resultToJson(result),
			'{"valid":false,"violation":{"index":2,"status":"DuplicateElement","table":"FieldDefinition"}}'
		)
	})
})
