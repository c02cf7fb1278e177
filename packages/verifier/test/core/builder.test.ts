import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ModuleBuilder } from '../../src/core/builder.ts'
import { moduleHandleIndex } from '../../src/core/indices.ts'
import { Kind } from '../../src/core/module.ts'
import { Type } from '../../src/core/signature.ts'

describe('core/builder', () => {
	it('should hand out dense indices per table', () => {
		const b = new ModuleBuilder()
		assert.strictEqual(b.identifier('a'), 0)
		assert.strictEqual(b.identifier('b'), 1)
		assert.strictEqual(b.addSignature([]), 0)
		assert.strictEqual(b.addSignature([Type.u8]), 1)
		assert.strictEqual(b.addModuleHandle('0x1', b.identifier('M')), 0)
	})

	it('should store module handle addresses in canonical form', () => {
		const b = new ModuleBuilder()
		const name = b.identifier('M')
		b.addModuleHandle('0x00C0FFEE', name)
		assert.deepStrictEqual(b.build().moduleHandles, [{ address: '0xc0ffee', name: 0 }])
	})

	it('should reject an invalid address', () => {
		const b = new ModuleBuilder()
		assert.throws(() => b.addModuleHandle('c0ffee', b.identifier('M')), {
			message: 'Invalid address: c0ffee',
		})
	})

	it('should not intern identifiers', () => {
		const b = new ModuleBuilder()
		const first = b.identifier('x')
		const second = b.identifier('x')
		assert.notStrictEqual(first, second)
		assert.deepStrictEqual(b.build().identifiers, ['x', 'x'])
	})

	it('should default the self module handle to 0', () => {
		const module = new ModuleBuilder().build()
		assert.strictEqual(module.selfModuleHandle, 0)
	})

	it('should designate the self module handle', () => {
		const b = new ModuleBuilder()
		const name = b.identifier('M')
		b.addModuleHandle('0x2', name)
		const self = b.addSelfModuleHandle('0x1', name)
		assert.strictEqual(self, 1)
		assert.strictEqual(b.build().selfModuleHandle, 1)

		b.setSelfModuleHandle(moduleHandleIndex(0))
		assert.strictEqual(b.build().selfModuleHandle, 0)
	})

	it('should fill struct handle defaults', () => {
		const b = new ModuleBuilder()
		const self = b.addSelfModuleHandle('0x1', b.identifier('M'))
		b.addStructHandle({ module: self, name: b.identifier('S') })
		b.addStructHandle({
			isNominalResource: true,
			module: self,
			name: b.identifier('R'),
			typeParameters: [Kind.Copyable],
		})
		assert.deepStrictEqual(b.build().structHandles, [
			{ isNominalResource: false, module: 0, name: 1, typeParameters: [] },
			{ isNominalResource: true, module: 0, name: 2, typeParameters: [Kind.Copyable] },
		])
	})

	it('should give function definitions an empty body by default', () => {
		const b = new ModuleBuilder()
		const self = b.addSelfModuleHandle('0x1', b.identifier('M'))
		const empty = b.addSignature([])
		const f = b.addFunctionHandle({
			module: self,
			name: b.identifier('f'),
			parameters: empty,
			returnType: empty,
		})
		b.addFunctionDefinition({ function: f })
		b.addFunctionDefinition({ code: null, function: f, isPublic: true })
		assert.deepStrictEqual(b.build().functionDefinitions, [
			{ acquiresGlobalResources: [], code: { code: [], locals: 0 }, function: 0, isPublic: false },
			{ acquiresGlobalResources: [], code: null, function: 0, isPublic: true },
		])
	})

	it('should store constants as bytes', () => {
		const b = new ModuleBuilder()
		b.addConstant(Type.u8, [255])
		const [constant] = b.build().constantPool
		assert.ok(constant?.data instanceof Uint8Array)
		assert.deepStrictEqual([...(constant?.data ?? [])], [255])
	})

	it('should separate native from declared struct definitions', () => {
		const b = new ModuleBuilder()
		const self = b.addSelfModuleHandle('0x1', b.identifier('M'))
		const s = b.addStructHandle({ module: self, name: b.identifier('S') })
		const n = b.addStructHandle({ module: self, name: b.identifier('N') })
		b.addStructDefinition(s, [{ name: b.identifier('x'), signature: Type.bool }])
		b.addNativeStructDefinition(n)
		const [declared, native] = b.build().structDefinitions
		assert.strictEqual(declared?.fieldInformation.kind, 'declared')
		assert.strictEqual(native?.fieldInformation.kind, 'native')
	})

	it('should not share tables between builds', () => {
		const b = new ModuleBuilder()
		b.identifier('a')
		const first = b.build()
		b.identifier('b')
		assert.deepStrictEqual(first.identifiers, ['a'])
		assert.deepStrictEqual(b.build().identifiers, ['a', 'b'])
		assert.deepStrictEqual(b.build().signatures, [])
	})
})
