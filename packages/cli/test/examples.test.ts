import assert from 'node:assert'
import { readFile } from 'node:fs/promises'
import { describe, it } from 'node:test'
import { loadModuleJson, verify } from '@modguard/verifier'
import { formatResult, resultToJson } from '../src/utils.ts'

async function loadExample(name: string) {
	const text = await readFile(new URL(`../examples/${name}`, import.meta.url), 'utf-8')
	return loadModuleJson(text)
}

describe('examples', () => {
	it('counter.json should verify', async () => {
		const module = await loadExample('counter.json')
		assert.strictEqual(module.name(), 'Counter')
		assert.strictEqual(formatResult('counter.json', verify(module)), 'counter.json: ok')
	})

	it('duplicate-field.json should be rejected at the repeated field', async () => {
		const module = await loadExample('duplicate-field.json')
		assert.strictEqual(
			resultToJson(verify(module)),
			'{"valid":false,"violation":{"index":2,"status":"DuplicateElement","table":"FieldDefinition"}}'
		)
	})
})
