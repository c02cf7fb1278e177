import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type CompiledModule, loadModuleJson, verify } from '@modguard/verifier'
import { formatLoadError, formatReadError, formatResult, resultToJson } from '../utils.ts'

export default class VerifyCommand extends BaseCommand {
	static override commandName = 'verify'
	static override description = 'Check a module description for structural consistency'

	@args.string({ description: 'Module description (.json) to verify' })
	declare input: string

	@flags.boolean({ description: 'Print the result as a single JSON object' })
	declare json: boolean

	private async readModuleFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private loadModule(text: string): CompiledModule | null {
		try {
			return loadModuleJson(text)
		} catch (error: unknown) {
			this.logger.error(formatLoadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const text = await this.readModuleFile()
		if (text === null) return

		const module = this.loadModule(text)
		if (module === null) return

		const result = verify(module)
		if (!result.valid) this.exitCode = 1

		if (this.json) {
			this.logger.log(resultToJson(result))
		} else if (result.valid) {
			this.logger.success(formatResult(this.input, result))
		} else {
			this.logger.error(formatResult(this.input, result))
		}
	}
}
