import { mkdir, writeFile } from 'node:fs/promises'
import { args, BaseCommand } from '@adonisjs/ace'
import { AstSpecError, astFileName, defineAst, EXPR_AST } from '@loxlex/astgen'
import {
	ExitCode,
	formatUnexpectedError,
	formatUsageError,
	formatWriteError,
	GENERATE_AST_USAGE,
	resolveAstOutputPath,
} from '../utils.ts'

export default class GenerateAstCommand extends BaseCommand {
	static override commandName = 'generate-ast'
	static override description = 'Generate the expression node classes and their visitor'

	@args.spread({ description: 'Directory to write expr.ts into', required: false })
	declare outputDir?: string[]

	private renderSource(): string | null {
		try {
			return defineAst(EXPR_AST)
		} catch (error: unknown) {
			const message = error instanceof AstSpecError ? error.message : formatUnexpectedError(error)
			this.logger.logError(message)
			this.exitCode = ExitCode.Failure
			return null
		}
	}

	private async writeOutputFile(dir: string, content: string): Promise<string | null> {
		const outputPath = resolveAstOutputPath(dir, astFileName(EXPR_AST.baseName))
		try {
			await mkdir(dir, { recursive: true })
			await writeFile(outputPath, content)
			return outputPath
		} catch (error: unknown) {
			this.logger.logError(formatWriteError(error))
			this.exitCode = ExitCode.Failure
			return null
		}
	}

	override async run(): Promise<void> {
		const dirs = this.outputDir ?? []
		const [dir] = dirs
		if (dir === undefined || dirs.length !== 1) {
			this.logger.logError(formatUsageError(GENERATE_AST_USAGE))
			this.exitCode = ExitCode.Usage
			return
		}

		const source = this.renderSource()
		if (source === null) return

		const written = await this.writeOutputFile(dir, source)
		if (written !== null) {
			this.logger.success(`Wrote ${written}`)
		}
	}
}
