/**
 * Core data structures for the scanner: tokens, keywords and the scan context.
 */

export {
	type Diagnostic,
	formatDiagnostic,
	ScanContext,
} from './context.ts'
export { type DiagnosticCode, SCANNER_DIAGNOSTICS } from './diagnostics.ts'
export { isKeyword, KEYWORDS, lookupKeyword } from './keywords.ts'
export { formatToken, type TokenJson, tokensToJson, tokenToJson } from './render.ts'
export {
	type Literal,
	type Token,
	TokenKind,
	TokenStore,
	tokenKindName,
} from './tokens.ts'
