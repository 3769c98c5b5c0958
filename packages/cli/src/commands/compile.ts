import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type EmitResult, compile, formatCompilerDiagnostic, type ReportOptions } from '@faultline/compiler'
import {
	formatCompileError,
	formatInvalidFormatError,
	formatReadError,
	formatWriteError,
	isValidFormat,
	type OutputFormat,
	renderOutput,
} from '../utils.ts'

export default class CompileCommand extends BaseCommand {
	static override commandName = 'compile'
	static override description = 'Compile a Faultline taxonomy into descriptors and documentation'

	@args.string({ description: 'Input .flt taxonomy file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Write output to this file instead of stdout' })
	declare output?: string

	@flags.string({
		alias: 'f',
		default: 'doc',
		description: 'Output format: doc (variant listing), json (descriptors) or check (summary)',
	})
	declare format: string

	@flags.boolean({ description: 'Fail when two variants share a code' })
	declare denyDuplicateCodes: boolean

	@flags.number({ default: 0, description: 'Source lines shown around each error' })
	declare context: number

	private get reportOptions(): ReportOptions {
		return { contextLinesAfter: this.context, contextLinesBefore: this.context }
	}

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private compileSource(source: string): EmitResult | null {
		try {
			const result = compile(source, {
				denyDuplicateCodes: this.denyDuplicateCodes,
				filename: this.input,
			})
			for (const warning of result.warnings) {
				this.logger.warning(formatCompilerDiagnostic(warning, this.reportOptions))
			}
			return result
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error, this.reportOptions))
			this.exitCode = 1
			return null
		}
	}

	private validateFormat(): OutputFormat | null {
		if (!isValidFormat(this.format)) {
			this.logger.error(formatInvalidFormatError(this.format))
			this.exitCode = 1
			return null
		}
		return this.format
	}

	private async emitOutput(result: EmitResult, format: OutputFormat): Promise<void> {
		const content = renderOutput(result, format)

		if (this.output === undefined) {
			this.logger.log(content)
			return
		}

		try {
			await writeFile(this.output, `${content}\n`)
			this.logger.success(`Wrote ${this.output}`)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const format = this.validateFormat()
		if (format === null) return

		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source)
		if (result === null) return

		await this.emitOutput(result, format)
	}
}
