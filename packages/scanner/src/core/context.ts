/**
 * Per-scan context: the source, the token store it fills, and the
 * diagnostics reported while filling it. One context per scan, never shared.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { TokenStore } from './tokens.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Location qualifier appended after `Error`, e.g. ` at end`. Empty for lexical errors. */
	readonly where: string
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

export class ScanContext {
	/** Original source code */
	readonly source: string

	/** Token storage (populated by the scanner) */
	readonly tokens: TokenStore

	/** Collected diagnostics */
	private readonly diagnostics: Diagnostic[] = []

	constructor(source: string) {
		this.source = source
		this.tokens = new TokenStore()
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.diagnostics.push({
			column,
			def,
			line,
			message,
			where: '',
			...(args ? { args } : {}),
		})
	}

	hasErrors(): boolean {
		return this.diagnostics.length > 0
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}
}

/**
 * Render a diagnostic for the error stream:
 *
 * ```
 * [line 3] Error: Unterminated string.
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	return `[line ${diagnostic.line}] Error${diagnostic.where}: ${diagnostic.message}`
}
