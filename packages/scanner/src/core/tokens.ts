/**
 * Token model and storage.
 * Tokens are collected in emission order in an append-only store.
 */

/** Token kinds - small integer discriminant, grouped by range. */
export const TokenKind = {
	// Single-character punctuation (0-19)
	Comma: 4,
	Dot: 5,
	LeftBrace: 2,
	LeftParen: 0,
	Minus: 6,
	Plus: 7,
	RightBrace: 3,
	RightParen: 1,
	Semicolon: 8,
	Slash: 9,
	Star: 10,

	// One- or two-character operators (20-39)
	Bang: 20,
	BangEqual: 21,
	Equal: 22,
	EqualEqual: 23,
	Greater: 24,
	GreaterEqual: 25,
	Less: 26,
	LessEqual: 27,

	// Keywords (40-99)
	And: 40,
	Class: 41,
	Else: 42,
	False: 43,
	For: 44,
	Fun: 45,
	If: 46,
	Nil: 47,
	Or: 48,
	Print: 49,
	Return: 50,
	Super: 51,
	This: 52,
	True: 53,
	Var: 54,
	While: 55,

	// Identifiers and literals (100-199)
	Identifier: 100,
	Number: 102,
	String: 101,

	// Special (255)
	Eof: 255,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

const TOKEN_KIND_NAMES: Record<TokenKind, string> = {
	[TokenKind.LeftParen]: 'LEFT_PAREN',
	[TokenKind.RightParen]: 'RIGHT_PAREN',
	[TokenKind.LeftBrace]: 'LEFT_BRACE',
	[TokenKind.RightBrace]: 'RIGHT_BRACE',
	[TokenKind.Comma]: 'COMMA',
	[TokenKind.Dot]: 'DOT',
	[TokenKind.Minus]: 'MINUS',
	[TokenKind.Plus]: 'PLUS',
	[TokenKind.Semicolon]: 'SEMICOLON',
	[TokenKind.Slash]: 'SLASH',
	[TokenKind.Star]: 'STAR',
	[TokenKind.Bang]: 'BANG',
	[TokenKind.BangEqual]: 'BANG_EQUAL',
	[TokenKind.Equal]: 'EQUAL',
	[TokenKind.EqualEqual]: 'EQUAL_EQUAL',
	[TokenKind.Greater]: 'GREATER',
	[TokenKind.GreaterEqual]: 'GREATER_EQUAL',
	[TokenKind.Less]: 'LESS',
	[TokenKind.LessEqual]: 'LESS_EQUAL',
	[TokenKind.And]: 'AND',
	[TokenKind.Class]: 'CLASS',
	[TokenKind.Else]: 'ELSE',
	[TokenKind.False]: 'FALSE',
	[TokenKind.For]: 'FOR',
	[TokenKind.Fun]: 'FUN',
	[TokenKind.If]: 'IF',
	[TokenKind.Nil]: 'NIL',
	[TokenKind.Or]: 'OR',
	[TokenKind.Print]: 'PRINT',
	[TokenKind.Return]: 'RETURN',
	[TokenKind.Super]: 'SUPER',
	[TokenKind.This]: 'THIS',
	[TokenKind.True]: 'TRUE',
	[TokenKind.Var]: 'VAR',
	[TokenKind.While]: 'WHILE',
	[TokenKind.Identifier]: 'IDENTIFIER',
	[TokenKind.String]: 'STRING',
	[TokenKind.Number]: 'NUMBER',
	[TokenKind.Eof]: 'EOF',
}

/** Display name of a kind, e.g. `BANG_EQUAL`. */
export function tokenKindName(kind: TokenKind): string {
	return TOKEN_KIND_NAMES[kind]
}

/**
 * Decoded payload of a literal token:
 * - Number: the numeric value
 * - String: the text between the quotes
 * - everything else: null
 */
export type Literal = number | string | null

/**
 * A single lexical unit. Immutable once added to a store.
 */
export interface Token {
	readonly kind: TokenKind
	/** Exact source text of the token (empty for Eof) */
	readonly lexeme: string
	readonly literal: Literal
	/** Line the token starts on (1-indexed) */
	readonly line: number
	/** Column the token starts on (1-indexed) */
	readonly column: number
}

/**
 * Append-only token sequence filled during one scan.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): void {
		this.tokens.push(token)
	}

	/** Snapshot of every token in emission order. */
	toArray(): readonly Token[] {
		return [...this.tokens]
	}
}
