import { TokenKind } from './tokens.ts'

/** Reserved words and the kind each one scans to. Matching is exact and case-sensitive. */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['and', TokenKind.And],
	['class', TokenKind.Class],
	['else', TokenKind.Else],
	['false', TokenKind.False],
	['for', TokenKind.For],
	['fun', TokenKind.Fun],
	['if', TokenKind.If],
	['nil', TokenKind.Nil],
	['or', TokenKind.Or],
	['print', TokenKind.Print],
	['return', TokenKind.Return],
	['super', TokenKind.Super],
	['this', TokenKind.This],
	['true', TokenKind.True],
	['var', TokenKind.Var],
	['while', TokenKind.While],
])

export function lookupKeyword(text: string): TokenKind | undefined {
	return KEYWORDS.get(text)
}

export function isKeyword(text: string): boolean {
	return KEYWORDS.has(text)
}
