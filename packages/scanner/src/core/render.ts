import { type Literal, type Token, tokenKindName } from './tokens.ts'

/**
 * One-line rendering used by the token dump: `<KIND> <lexeme> <literal>`.
 * Absent literals print as `null`, so EOF renders as `EOF  null`.
 */
export function formatToken(token: Token): string {
	const literal = token.literal === null ? 'null' : String(token.literal)
	return `${tokenKindName(token.kind)} ${token.lexeme} ${literal}`
}

export interface TokenJson {
	readonly kind: string
	readonly lexeme: string
	readonly literal: Literal
	readonly line: number
	readonly column: number
}

export function tokenToJson(token: Token): TokenJson {
	return {
		column: token.column,
		kind: tokenKindName(token.kind),
		lexeme: token.lexeme,
		line: token.line,
		literal: token.literal,
	}
}

export function tokensToJson(tokens: Iterable<Token>): TokenJson[] {
	return Array.from(tokens, tokenToJson)
}
