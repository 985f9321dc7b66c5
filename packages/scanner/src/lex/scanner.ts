import type { ScanContext } from '../core/context.ts'
import { lookupKeyword } from '../core/keywords.ts'
import { type Literal, TokenKind } from '../core/tokens.ts'
import { type CharClass, classifyChar, isAlphaNumeric, isDigit } from './classify.ts'

export interface ScanResult {
	succeeded: boolean
}

/**
 * Cursor over one source buffer. Created per scan; nothing here is shared.
 * Invariant: 0 <= start <= current <= source.length.
 */
interface ScannerState {
	readonly source: string
	/** First character of the lexeme being scanned */
	start: number
	/** Next unread character */
	current: number
	line: number
	/** Index of the first character of the current line */
	lineStart: number
	startLine: number
	startColumn: number
}

const NUL = '\0'

function createScannerState(source: string): ScannerState {
	return {
		current: 0,
		line: 1,
		lineStart: 0,
		source,
		start: 0,
		startColumn: 1,
		startLine: 1,
	}
}

function isAtEnd(state: ScannerState): boolean {
	return state.current >= state.source.length
}

function advance(state: ScannerState): string {
	const char = state.source.charAt(state.current)
	state.current++
	return char
}

function match(state: ScannerState, expected: string): boolean {
	if (isAtEnd(state)) return false
	if (state.source.charAt(state.current) !== expected) return false
	state.current++
	return true
}

function peek(state: ScannerState): string {
	if (isAtEnd(state)) return NUL
	return state.source.charAt(state.current)
}

function peekNext(state: ScannerState): string {
	if (state.current + 1 >= state.source.length) return NUL
	return state.source.charAt(state.current + 1)
}

/** Called after consuming a `\n`. */
function newLine(state: ScannerState): void {
	state.line++
	state.lineStart = state.current
}

function currentColumn(state: ScannerState): number {
	return state.current - state.lineStart + 1
}

function beginLexeme(state: ScannerState): void {
	state.start = state.current
	state.startLine = state.line
	state.startColumn = currentColumn(state)
}

function addToken(
	state: ScannerState,
	context: ScanContext,
	kind: TokenKind,
	literal: Literal = null
): void {
	context.tokens.add({
		column: state.startColumn,
		kind,
		lexeme: state.source.slice(state.start, state.current),
		line: state.startLine,
		literal,
	})
}

function skipLineComment(state: ScannerState): void {
	while (peek(state) !== '\n' && !isAtEnd(state)) advance(state)
}

function scanString(state: ScannerState, context: ScanContext): void {
	while (peek(state) !== '"' && !isAtEnd(state)) {
		if (advance(state) === '\n') newLine(state)
	}

	if (isAtEnd(state)) {
		context.emit('LXSCAN002', state.line, currentColumn(state))
		return
	}

	// closing quote
	advance(state)
	addToken(state, context, TokenKind.String, state.source.slice(state.start + 1, state.current - 1))
}

function consumeDigits(state: ScannerState): void {
	while (isDigit(peek(state))) advance(state)
}

function scanNumber(state: ScannerState, context: ScanContext): void {
	consumeDigits(state)

	if (peek(state) === '.' && isDigit(peekNext(state))) {
		advance(state)
		consumeDigits(state)
	}

	const lexeme = state.source.slice(state.start, state.current)
	addToken(state, context, TokenKind.Number, Number.parseFloat(lexeme))
}

function scanIdentifier(state: ScannerState, context: ScanContext): void {
	while (isAlphaNumeric(peek(state))) advance(state)

	const text = state.source.slice(state.start, state.current)
	addToken(state, context, lookupKeyword(text) ?? TokenKind.Identifier)
}

function isHighSurrogate(char: string): boolean {
	const code = char.charCodeAt(0)
	return code >= 0xd800 && code <= 0xdbff
}

function isLowSurrogate(char: string): boolean {
	const code = char.charCodeAt(0)
	return code >= 0xdc00 && code <= 0xdfff
}

/** Reports the character once, keeping astral characters whole. */
function reportUnexpected(char: string, state: ScannerState, context: ScanContext): void {
	if (isHighSurrogate(char) && isLowSurrogate(peek(state))) advance(state)
	context.emit('LXSCAN001', state.startLine, state.startColumn, {
		character: state.source.slice(state.start, state.current),
	})
}

function scanToken(state: ScannerState, context: ScanContext): void {
	const char = advance(state)
	const charClass: CharClass = classifyChar(char)

	switch (charClass.kind) {
		case 'skip':
			return
		case 'newline':
			newLine(state)
			return
		case 'single':
			addToken(state, context, charClass.token)
			return
		case 'pair':
			addToken(state, context, match(state, '=') ? charClass.withEquals : charClass.token)
			return
		case 'slash':
			if (match(state, '/')) {
				skipLineComment(state)
			} else {
				addToken(state, context, TokenKind.Slash)
			}
			return
		case 'quote':
			scanString(state, context)
			return
		case 'digit':
			scanNumber(state, context)
			return
		case 'alpha':
			scanIdentifier(state, context)
			return
		case 'unknown':
			reportUnexpected(char, state, context)
			return
		default:
			assertNever(charClass)
	}
}

function assertNever(value: never): never {
	throw new Error(`Unhandled character class: ${JSON.stringify(value)}`)
}

function finishScan(state: ScannerState, context: ScanContext): void {
	context.tokens.add({
		column: currentColumn(state),
		kind: TokenKind.Eof,
		lexeme: '',
		line: state.line,
		literal: null,
	})
}

/**
 * Scans context.source left to right in a single pass, populating context.tokens.
 * Lexical errors are reported through the context and never stop the scan;
 * the store always ends with exactly one Eof token.
 */
export function scan(context: ScanContext): ScanResult {
	const state = createScannerState(context.source)

	while (!isAtEnd(state)) {
		beginLexeme(state)
		scanToken(state, context)
	}

	finishScan(state, context)
	return { succeeded: !context.hasErrors() }
}
