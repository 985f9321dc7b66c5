import { formatDiagnostic, scanTokens } from '@loxlex/scanner'
import { type OutputFormat, renderTokens } from './utils.ts'

/**
 * What one scan of a source buffer has to show: token lines for stdout,
 * diagnostic lines for stderr.
 */
export interface RunOutcome {
	readonly output: readonly string[]
	readonly errors: readonly string[]
	readonly hadError: boolean
}

export function runSource(source: string, format: OutputFormat): RunOutcome {
	const { diagnostics, succeeded, tokens } = scanTokens(source)
	return {
		errors: diagnostics.map(formatDiagnostic),
		hadError: !succeeded,
		output: renderTokens(tokens, format),
	}
}
