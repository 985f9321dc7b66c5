import { TokenKind } from '../core/tokens.ts'

/**
 * Lexical category of a single character. The scanner switches over
 * `kind` exhaustively; only `pair` and `slash` need further lookahead.
 */
export type CharClass =
	| { readonly kind: 'skip' }
	| { readonly kind: 'newline' }
	| { readonly kind: 'single'; readonly token: TokenKind }
	| { readonly kind: 'pair'; readonly token: TokenKind; readonly withEquals: TokenKind }
	| { readonly kind: 'slash' }
	| { readonly kind: 'quote' }
	| { readonly kind: 'digit' }
	| { readonly kind: 'alpha' }
	| { readonly kind: 'unknown' }

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['(', TokenKind.LeftParen],
	[')', TokenKind.RightParen],
	['{', TokenKind.LeftBrace],
	['}', TokenKind.RightBrace],
	[',', TokenKind.Comma],
	['.', TokenKind.Dot],
	['-', TokenKind.Minus],
	['+', TokenKind.Plus],
	[';', TokenKind.Semicolon],
	['*', TokenKind.Star],
])

/** Operators that become a two-character token when followed by `=`. */
const EQUALS_PAIRS: ReadonlyMap<string, readonly [TokenKind, TokenKind]> = new Map<
	string,
	readonly [TokenKind, TokenKind]
>([
	['!', [TokenKind.Bang, TokenKind.BangEqual]],
	['=', [TokenKind.Equal, TokenKind.EqualEqual]],
	['<', [TokenKind.Less, TokenKind.LessEqual]],
	['>', [TokenKind.Greater, TokenKind.GreaterEqual]],
])

const SKIP: CharClass = { kind: 'skip' }
const NEWLINE: CharClass = { kind: 'newline' }
const SLASH: CharClass = { kind: 'slash' }
const QUOTE: CharClass = { kind: 'quote' }
const DIGIT: CharClass = { kind: 'digit' }
const ALPHA: CharClass = { kind: 'alpha' }
const UNKNOWN: CharClass = { kind: 'unknown' }

export function isDigit(char: string): boolean {
	return char >= '0' && char <= '9' && char.length === 1
}

export function isAlpha(char: string): boolean {
	if (char.length !== 1) return false
	return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_'
}

export function isAlphaNumeric(char: string): boolean {
	return isAlpha(char) || isDigit(char)
}

function classifyFixed(char: string): CharClass | null {
	const single = SINGLE_CHAR_TOKENS.get(char)
	if (single !== undefined) return { kind: 'single', token: single }

	const pair = EQUALS_PAIRS.get(char)
	if (pair !== undefined) return { kind: 'pair', token: pair[0], withEquals: pair[1] }

	return null
}

/**
 * Classify one character of source text. Pure: the same character always
 * yields the same category.
 */
export function classifyChar(char: string): CharClass {
	switch (char) {
		case ' ':
		case '\r':
		case '\t':
			return SKIP
		case '\n':
			return NEWLINE
		case '/':
			return SLASH
		case '"':
			return QUOTE
	}

	const fixed = classifyFixed(char)
	if (fixed !== null) return fixed
	if (isDigit(char)) return DIGIT
	if (isAlpha(char)) return ALPHA
	return UNKNOWN
}
