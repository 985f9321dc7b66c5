/**
 * loxlex scanner public API
 *
 * - Append-only token storage (TokenStore)
 * - One ScanContext per scan carrying the tokens and diagnostics
 * - Diagnostics are returned as data; nothing here exits or prints
 */

import { type Diagnostic, ScanContext } from './core/context.ts'
import type { Token } from './core/tokens.ts'
import { scan } from './lex/scanner.ts'

export {
	type Diagnostic,
	type DiagnosticCode,
	formatDiagnostic,
	formatToken,
	isKeyword,
	KEYWORDS,
	type Literal,
	lookupKeyword,
	SCANNER_DIAGNOSTICS,
	ScanContext,
	type Token,
	type TokenJson,
	TokenKind,
	TokenStore,
	tokenKindName,
	tokensToJson,
	tokenToJson,
} from './core/index.ts'
export {
	type CharClass,
	classifyChar,
	isAlpha,
	isAlphaNumeric,
	isDigit,
	type ScanResult,
	scan,
} from './lex/index.ts'

/**
 * Everything one scan produced.
 */
export interface ScanOutput {
	/** Tokens in emission order, always ending with a single Eof */
	readonly tokens: readonly Token[]
	/** Lexical diagnostics in the order they were reported */
	readonly diagnostics: readonly Diagnostic[]
	/** True when no error was reported */
	readonly succeeded: boolean
}

/**
 * Scan Lox source text into tokens.
 *
 * Scanning always runs to the end of the input: unexpected characters and
 * unterminated strings are reported in `diagnostics` and skipped.
 *
 * @example
 * ```ts
 * const { tokens } = scanTokens('var x = 12.5;')
 * tokens.map(formatToken)
 * // ['VAR var null', 'IDENTIFIER x null', 'EQUAL = null', 'NUMBER 12.5 12.5', 'SEMICOLON ; null', 'EOF  null']
 * ```
 */
export function scanTokens(source: string): ScanOutput {
	const context = new ScanContext(source)
	const { succeeded } = scan(context)
	return {
		diagnostics: context.getDiagnostics(),
		succeeded,
		tokens: context.tokens.toArray(),
	}
}
