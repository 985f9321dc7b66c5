import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { runPrompt } from '../repl.ts'
import { runSource } from '../run.ts'
import {
	ExitCode,
	formatInvalidFormatError,
	formatReadError,
	formatUsageError,
	isValidFormat,
	type OutputFormat,
	SCAN_USAGE,
	stripBom,
} from '../utils.ts'

export default class ScanCommand extends BaseCommand {
	static override commandName = 'scan'
	static override description = 'Print the tokens of a Lox script, or start a REPL without one'

	@args.spread({ description: 'Script to scan (omit to start a REPL)', required: false })
	declare script?: string[]

	@flags.string({
		alias: 'f',
		default: 'text',
		description: 'Token output: text (one per line) or json',
	})
	declare format: string

	private resolveFormat(): OutputFormat | null {
		if (!isValidFormat(this.format)) {
			this.logger.logError(formatInvalidFormatError(this.format))
			this.exitCode = ExitCode.Usage
			return null
		}
		return this.format
	}

	private async readSourceFile(path: string): Promise<string | null> {
		try {
			return stripBom(await readFile(path, 'utf-8'))
		} catch (error: unknown) {
			this.logger.logError(formatReadError(path, error))
			this.exitCode = ExitCode.Failure
			return null
		}
	}

	private async runFile(path: string, format: OutputFormat): Promise<void> {
		const source = await this.readSourceFile(path)
		if (source === null) return

		const outcome = runSource(source, format)
		for (const line of outcome.output) this.logger.log(line)
		for (const line of outcome.errors) this.logger.logError(line)

		if (outcome.hadError) {
			this.exitCode = ExitCode.DataError
		}
	}

	override async run(): Promise<void> {
		const scripts = this.script ?? []
		if (scripts.length > 1) {
			this.logger.logError(formatUsageError(SCAN_USAGE))
			this.exitCode = ExitCode.Usage
			return
		}

		const format = this.resolveFormat()
		if (format === null) return

		const [path] = scripts
		if (path === undefined) {
			await runPrompt({ error: process.stderr, input: process.stdin, output: process.stdout }, format)
			return
		}

		await this.runFile(path, format)
	}
}
