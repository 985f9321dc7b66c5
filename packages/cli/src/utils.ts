import { join } from 'node:path'
import {
	formatCatalogMessage,
	LXCLI001,
	LXCLI002,
	LXCLI003,
	LXCLI004,
	LXCLI005,
	LXCLI006,
} from '@loxlex/diagnostics'
import { formatToken, type Token, tokensToJson } from '@loxlex/scanner'

/** Process exit codes; 64 and 65 follow sysexits.h (EX_USAGE, EX_DATAERR). */
export const ExitCode = {
	DataError: 65,
	Failure: 1,
	Success: 0,
	Usage: 64,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export type OutputFormat = 'text' | 'json'

export const SCAN_USAGE = 'loxlex [script]'
export const GENERATE_AST_USAGE = 'loxlex generate-ast <output directory>'

const UTF8_BOM = '\uFEFF'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatUsageError(usage: string): string {
	return formatCatalogMessage(LXCLI001, { usage })
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCatalogMessage(LXCLI002, { path: filePath })
	}
	return formatCatalogMessage(LXCLI003, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCatalogMessage(LXCLI004, { reason: getErrorMessage(error) })
}

export function formatInvalidFormatError(format: string): string {
	return formatCatalogMessage(LXCLI005, { format })
}

export function formatUnexpectedError(error: unknown): string {
	return formatCatalogMessage(LXCLI006, { reason: getErrorMessage(error) })
}

export function isValidFormat(value: string): value is OutputFormat {
	return value === 'text' || value === 'json'
}

export function stripBom(source: string): string {
	return source.startsWith(UTF8_BOM) ? source.slice(1) : source
}

/**
 * Render scanned tokens for stdout: one `formatToken` line per token,
 * or a single pretty-printed JSON array.
 */
export function renderTokens(tokens: readonly Token[], format: OutputFormat): string[] {
	if (format === 'json') {
		return [JSON.stringify(tokensToJson(tokens), null, 2)]
	}
	return tokens.map(formatToken)
}

/** Kernel flags that act on the whole binary, not on `scan`. */
const KERNEL_FLAGS: readonly string[] = ['--help', '-h', '--version', '-v']

/**
 * Route arguments that don't start with a known command name or a kernel
 * flag to `scan`, so `loxlex`, `loxlex main.lox` and
 * `loxlex --format json main.lox` work while `loxlex --help` still lists
 * every command. A script whose name is also a command is run with
 * `loxlex scan <script>`.
 */
export function resolveCommandArgv(argv: readonly string[], commandNames: readonly string[]): string[] {
	const [first] = argv
	if (first !== undefined && (commandNames.includes(first) || KERNEL_FLAGS.includes(first))) {
		return [...argv]
	}
	return ['scan', ...argv]
}

export function resolveAstOutputPath(outputDir: string, fileName: string): string {
	return join(outputDir, fileName)
}
