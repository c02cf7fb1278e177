/**
 * JSON module descriptions.
 *
 * Reads the JSON form of a module into a CompiledModule. This is the only
 * place raw input is trusted less than a CompiledModule: shapes, integer
 * ranges and every cross-table index are checked here, so the consistency
 * checks never see an index that points outside its table.
 *
 * No consistency checks happen here; duplicates and missing definitions load
 * fine and are left for `verify`.
 */

import { ADDRESS_LENGTH, canonicalAddress } from '../core/address.ts'
import {
	fieldHandleIndex,
	functionHandleIndex,
	identifierIndex,
	moduleHandleIndex,
	signatureIndex,
	structDefinitionIndex,
	structHandleIndex,
} from '../core/indices.ts'
import {
	type CodeUnit,
	CompiledModule,
	type Constant,
	type FieldDefinition,
	type FieldHandle,
	type FieldInstantiation,
	type FunctionDefinition,
	type FunctionHandle,
	type FunctionInstantiation,
	Kind,
	type ModuleHandle,
	type Signature,
	type StructDefInstantiation,
	type StructDefinition,
	type StructHandle,
} from '../core/module.ts'
import { type SignatureToken, SignatureTokenKind, Type } from '../core/signature.ts'

export class ModuleFormatError extends Error {
	/** Location of the offending value, e.g. `structHandles[2].module` */
	readonly path: string
	readonly reason: string

	constructor(path: string, reason: string) {
		super(path === '' ? reason : `${path}: ${reason}`)
		this.name = 'ModuleFormatError'
		this.path = path
		this.reason = reason
	}
}

type JsonObject = Record<string, unknown>

type TableName =
	| 'identifiers'
	| 'constantPool'
	| 'signatures'
	| 'moduleHandles'
	| 'structHandles'
	| 'functionHandles'
	| 'fieldHandles'
	| 'structInstantiations'
	| 'functionInstantiations'
	| 'fieldInstantiations'
	| 'structDefinitions'
	| 'functionDefinitions'

const PRIMITIVES = new Map<string, SignatureToken>([
	['address', Type.address],
	['bool', Type.bool],
	['signer', Type.signer],
	['u8', Type.u8],
	['u64', Type.u64],
	['u128', Type.u128],
])

const KINDS = new Map<string, Kind>([
	['all', Kind.All],
	['copyable', Kind.Copyable],
	['resource', Kind.Resource],
])

/** Keys that select the shape of a composite signature token. */
const TOKEN_KEYS = ['vector', 'reference', 'mutableReference', 'typeParameter', 'struct'] as const

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/

function isObject(value: unknown): value is JsonObject {
	return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function at(path: string, key: string | number): string {
	if (typeof key === 'number') return `${path}[${key}]`
	return path === '' ? key : `${path}.${key}`
}

/**
 * Decodes one module description. Holds the table sizes so every index can
 * be range-checked against the table it addresses.
 */
class ModuleReader {
	private readonly sizes: Record<TableName, number>

	constructor(private readonly root: JsonObject) {
		const size = (name: TableName): number => this.table(name).length
		this.sizes = {
			constantPool: size('constantPool'),
			fieldHandles: size('fieldHandles'),
			fieldInstantiations: size('fieldInstantiations'),
			functionDefinitions: size('functionDefinitions'),
			functionHandles: size('functionHandles'),
			functionInstantiations: size('functionInstantiations'),
			identifiers: size('identifiers'),
			moduleHandles: size('moduleHandles'),
			signatures: size('signatures'),
			structDefinitions: size('structDefinitions'),
			structHandles: size('structHandles'),
			structInstantiations: size('structInstantiations'),
		}
	}

	read(): CompiledModule {
		return new CompiledModule({
			constantPool: this.entries('constantPool', (v, p) => this.constant(v, p)),
			fieldHandles: this.entries('fieldHandles', (v, p) => this.fieldHandle(v, p)),
			fieldInstantiations: this.entries('fieldInstantiations', (v, p) =>
				this.fieldInstantiation(v, p)
			),
			functionDefinitions: this.entries('functionDefinitions', (v, p) =>
				this.functionDefinition(v, p)
			),
			functionHandles: this.entries('functionHandles', (v, p) => this.functionHandle(v, p)),
			functionInstantiations: this.entries('functionInstantiations', (v, p) =>
				this.functionInstantiation(v, p)
			),
			identifiers: this.entries('identifiers', (v, p) => this.string(v, p)),
			moduleHandles: this.entries('moduleHandles', (v, p) => this.moduleHandle(v, p)),
			selfModuleHandle: moduleHandleIndex(
				this.index(this.root['selfModuleHandle'], 'selfModuleHandle', 'moduleHandles')
			),
			signatures: this.entries('signatures', (v, p) => this.signature(v, p)),
			structDefinitions: this.entries('structDefinitions', (v, p) =>
				this.structDefinition(v, p)
			),
			structHandles: this.entries('structHandles', (v, p) => this.structHandle(v, p)),
			structInstantiations: this.entries('structInstantiations', (v, p) =>
				this.structInstantiation(v, p)
			),
		})
	}

	// ===========================================================================
	// Primitives
	// ===========================================================================

	private table(name: TableName): unknown[] {
		const value = this.root[name]
		if (value === undefined) return []
		if (!Array.isArray(value)) throw new ModuleFormatError(name, 'expected an array')
		return value
	}

	private entries<T>(name: TableName, decode: (value: unknown, path: string) => T): T[] {
		return this.table(name).map((value, i) => decode(value, at(name, i)))
	}

	private object(value: unknown, path: string): JsonObject {
		if (!isObject(value)) throw new ModuleFormatError(path, 'expected an object')
		return value
	}

	private array(value: unknown, path: string): unknown[] {
		if (!Array.isArray(value)) throw new ModuleFormatError(path, 'expected an array')
		return value
	}

	private string(value: unknown, path: string): string {
		if (typeof value !== 'string') throw new ModuleFormatError(path, 'expected a string')
		return value
	}

	private boolean(value: unknown, path: string, fallback: boolean): boolean {
		if (value === undefined) return fallback
		if (typeof value !== 'boolean') throw new ModuleFormatError(path, 'expected a boolean')
		return value
	}

	private integer(value: unknown, path: string, max: number): number {
		if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
			throw new ModuleFormatError(path, `expected an integer between 0 and ${max}`)
		}
		return value
	}

	private index(value: unknown, path: string, table: TableName): number {
		const n = this.integer(value, path, Number.MAX_SAFE_INTEGER)
		const size = this.sizes[table]
		if (n >= size) {
			throw new ModuleFormatError(path, `index ${n} out of range for ${table} (${size} entries)`)
		}
		return n
	}

	private bytes(value: unknown, path: string): Uint8Array {
		const hex = this.string(value, path)
		if (!HEX_PATTERN.test(hex)) {
			throw new ModuleFormatError(path, 'expected an even-length hex string')
		}
		const data = new Uint8Array(hex.length / 2)
		for (let i = 0; i < data.length; i++) {
			data[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16)
		}
		return data
	}

	private kinds(value: unknown, path: string): Kind[] {
		if (value === undefined) return []
		return this.array(value, path).map((item, i) => {
			const name = this.string(item, at(path, i))
			const kind = KINDS.get(name)
			if (kind === undefined) {
				throw new ModuleFormatError(at(path, i), `unknown kind "${name}"`)
			}
			return kind
		})
	}

	// ===========================================================================
	// Signatures
	// ===========================================================================

	private token(value: unknown, path: string): SignatureToken {
		if (typeof value === 'string') {
			const primitive = PRIMITIVES.get(value)
			if (primitive === undefined) {
				throw new ModuleFormatError(path, `unknown primitive type "${value}"`)
			}
			return primitive
		}
		const obj = this.object(value, path)
		const present = TOKEN_KEYS.filter((key) => Object.hasOwn(obj, key))
		const [key] = present
		if (key === undefined) {
			throw new ModuleFormatError(path, 'unknown signature token')
		}
		if (present.length > 1) {
			throw new ModuleFormatError(
				path,
				`ambiguous signature token: ${present.map((k) => `"${k}"`).join(', ')}`
			)
		}
		const inner = at(path, key)
		switch (key) {
			case 'vector':
				return Type.vector(this.token(obj[key], inner))
			case 'reference':
				return Type.reference(this.token(obj[key], inner))
			case 'mutableReference':
				return Type.mutableReference(this.token(obj[key], inner))
			case 'typeParameter':
				return Type.typeParameter(this.integer(obj[key], inner, 0xffff))
			case 'struct': {
				const handle = structHandleIndex(this.index(obj[key], inner, 'structHandles'))
				const args = obj['typeArguments']
				if (args === undefined) return { handle, kind: SignatureTokenKind.Struct }
				const typeArguments = this.array(args, at(path, 'typeArguments')).map((arg, i) =>
					this.token(arg, at(at(path, 'typeArguments'), i))
				)
				return { handle, kind: SignatureTokenKind.StructInstantiation, typeArguments }
			}
		}
	}

	private signature(value: unknown, path: string): Signature {
		return {
			tokens: this.array(value, path).map((token, i) => this.token(token, at(path, i))),
		}
	}

	private constant(value: unknown, path: string): Constant {
		const obj = this.object(value, path)
		return {
			data: this.bytes(obj['data'], at(path, 'data')),
			type: this.token(obj['type'], at(path, 'type')),
		}
	}

	// ===========================================================================
	// Handles
	// ===========================================================================

	private moduleHandle(value: unknown, path: string): ModuleHandle {
		const obj = this.object(value, path)
		const address = canonicalAddress(this.string(obj['address'], at(path, 'address')))
		if (address === null) {
			throw new ModuleFormatError(
				at(path, 'address'),
				`expected a 0x-prefixed hex address of at most ${ADDRESS_LENGTH} bytes`
			)
		}
		return {
			address,
			name: identifierIndex(this.index(obj['name'], at(path, 'name'), 'identifiers')),
		}
	}

	private structHandle(value: unknown, path: string): StructHandle {
		const obj = this.object(value, path)
		return {
			isNominalResource: this.boolean(
				obj['isNominalResource'],
				at(path, 'isNominalResource'),
				false
			),
			module: moduleHandleIndex(this.index(obj['module'], at(path, 'module'), 'moduleHandles')),
			name: identifierIndex(this.index(obj['name'], at(path, 'name'), 'identifiers')),
			typeParameters: this.kinds(obj['typeParameters'], at(path, 'typeParameters')),
		}
	}

	private functionHandle(value: unknown, path: string): FunctionHandle {
		const obj = this.object(value, path)
		return {
			module: moduleHandleIndex(this.index(obj['module'], at(path, 'module'), 'moduleHandles')),
			name: identifierIndex(this.index(obj['name'], at(path, 'name'), 'identifiers')),
			parameters: signatureIndex(
				this.index(obj['parameters'], at(path, 'parameters'), 'signatures')
			),
			returnType: signatureIndex(
				this.index(obj['returnType'], at(path, 'returnType'), 'signatures')
			),
			typeParameters: this.kinds(obj['typeParameters'], at(path, 'typeParameters')),
		}
	}

	private fieldHandle(value: unknown, path: string): FieldHandle {
		const obj = this.object(value, path)
		return {
			field: this.integer(obj['field'], at(path, 'field'), 0xffff),
			owner: structDefinitionIndex(
				this.index(obj['owner'], at(path, 'owner'), 'structDefinitions')
			),
		}
	}

	// ===========================================================================
	// Instantiations
	// ===========================================================================

	private structInstantiation(value: unknown, path: string): StructDefInstantiation {
		const obj = this.object(value, path)
		return {
			def: structDefinitionIndex(this.index(obj['def'], at(path, 'def'), 'structDefinitions')),
			typeParameters: signatureIndex(
				this.index(obj['typeParameters'], at(path, 'typeParameters'), 'signatures')
			),
		}
	}

	private functionInstantiation(value: unknown, path: string): FunctionInstantiation {
		const obj = this.object(value, path)
		return {
			handle: functionHandleIndex(
				this.index(obj['handle'], at(path, 'handle'), 'functionHandles')
			),
			typeParameters: signatureIndex(
				this.index(obj['typeParameters'], at(path, 'typeParameters'), 'signatures')
			),
		}
	}

	private fieldInstantiation(value: unknown, path: string): FieldInstantiation {
		const obj = this.object(value, path)
		return {
			handle: fieldHandleIndex(this.index(obj['handle'], at(path, 'handle'), 'fieldHandles')),
			typeParameters: signatureIndex(
				this.index(obj['typeParameters'], at(path, 'typeParameters'), 'signatures')
			),
		}
	}

	// ===========================================================================
	// Definitions
	// ===========================================================================

	private field(value: unknown, path: string): FieldDefinition {
		const obj = this.object(value, path)
		return {
			name: identifierIndex(this.index(obj['name'], at(path, 'name'), 'identifiers')),
			signature: this.token(obj['type'], at(path, 'type')),
		}
	}

	private structDefinition(value: unknown, path: string): StructDefinition {
		const obj = this.object(value, path)
		const structHandle = structHandleIndex(
			this.index(obj['structHandle'], at(path, 'structHandle'), 'structHandles')
		)
		if (this.boolean(obj['native'], at(path, 'native'), false)) {
			if (obj['fields'] !== undefined) {
				throw new ModuleFormatError(at(path, 'fields'), 'native structs cannot declare fields')
			}
			return { fieldInformation: { kind: 'native' }, structHandle }
		}
		const fields = this.array(obj['fields'], at(path, 'fields')).map((field, i) =>
			this.field(field, at(at(path, 'fields'), i))
		)
		return { fieldInformation: { fields, kind: 'declared' }, structHandle }
	}

	private code(obj: JsonObject, path: string): CodeUnit {
		return {
			code: this.array(obj['code'] ?? [], at(path, 'code')).map((op, i) =>
				this.integer(op, at(at(path, 'code'), i), 0xff)
			),
			locals: signatureIndex(this.index(obj['locals'], at(path, 'locals'), 'signatures')),
		}
	}

	private functionDefinition(value: unknown, path: string): FunctionDefinition {
		const obj = this.object(value, path)
		const acquires = obj['acquires'] ?? []
		const native = this.boolean(obj['native'], at(path, 'native'), false)
		if (native) {
			for (const key of ['locals', 'code']) {
				if (obj[key] !== undefined) {
					throw new ModuleFormatError(at(path, key), 'native functions cannot declare a body')
				}
			}
		}
		return {
			acquiresGlobalResources: this.array(acquires, at(path, 'acquires')).map((def, i) =>
				structDefinitionIndex(this.index(def, at(at(path, 'acquires'), i), 'structDefinitions'))
			),
			code: native ? null : this.code(obj, path),
			function: functionHandleIndex(
				this.index(obj['function'], at(path, 'function'), 'functionHandles')
			),
			isPublic: this.boolean(obj['isPublic'], at(path, 'isPublic'), false),
		}
	}
}

/**
 * Decode an already-parsed JSON value.
 */
export function moduleFromJson(value: unknown): CompiledModule {
	if (!isObject(value)) throw new ModuleFormatError('', 'expected a module object')
	return new ModuleReader(value).read()
}

/**
 * Parse and decode a JSON module description.
 */
export function loadModuleJson(text: string): CompiledModule {
	let value: unknown
	try {
		value = JSON.parse(text)
	} catch (error: unknown) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new ModuleFormatError('', `invalid JSON: ${reason}`)
	}
	return moduleFromJson(value)
}
