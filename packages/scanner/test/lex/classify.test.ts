import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenKind } from '../../src/core/tokens.ts'
import { classifyChar, isAlpha, isAlphaNumeric, isDigit } from '../../src/lex/classify.ts'

describe('lex/classify', () => {
	describe('classifyChar', () => {
		it('should skip spaces, tabs and carriage returns', () => {
			for (const char of [' ', '\t', '\r']) {
				assert.deepStrictEqual(classifyChar(char), { kind: 'skip' })
			}
		})

		it('should classify newline separately', () => {
			assert.deepStrictEqual(classifyChar('\n'), { kind: 'newline' })
		})

		it('should map punctuation to its token kind', () => {
			assert.deepStrictEqual(classifyChar('('), { kind: 'single', token: TokenKind.LeftParen })
			assert.deepStrictEqual(classifyChar('}'), { kind: 'single', token: TokenKind.RightBrace })
			assert.deepStrictEqual(classifyChar(';'), { kind: 'single', token: TokenKind.Semicolon })
			assert.deepStrictEqual(classifyChar('-'), { kind: 'single', token: TokenKind.Minus })
		})

		it('should pair comparison operators with their = forms', () => {
			assert.deepStrictEqual(classifyChar('!'), {
				kind: 'pair',
				token: TokenKind.Bang,
				withEquals: TokenKind.BangEqual,
			})
			assert.deepStrictEqual(classifyChar('<'), {
				kind: 'pair',
				token: TokenKind.Less,
				withEquals: TokenKind.LessEqual,
			})
		})

		it('should give slash and quote their own categories', () => {
			assert.deepStrictEqual(classifyChar('/'), { kind: 'slash' })
			assert.deepStrictEqual(classifyChar('"'), { kind: 'quote' })
		})

		it('should classify digits and identifier starts', () => {
			assert.deepStrictEqual(classifyChar('7'), { kind: 'digit' })
			assert.deepStrictEqual(classifyChar('q'), { kind: 'alpha' })
			assert.deepStrictEqual(classifyChar('_'), { kind: 'alpha' })
		})

		it('should leave everything else unknown', () => {
			for (const char of ['@', '#', '$', '\'', 'é', '\0']) {
				assert.deepStrictEqual(classifyChar(char), { kind: 'unknown' })
			}
		})
	})

	describe('character predicates', () => {
		it('should accept only ASCII digits', () => {
			assert.strictEqual(isDigit('0'), true)
			assert.strictEqual(isDigit('9'), true)
			assert.strictEqual(isDigit('a'), false)
			assert.strictEqual(isDigit('٣'), false)
			assert.strictEqual(isDigit(''), false)
		})

		it('should accept ASCII letters and underscore as alpha', () => {
			assert.strictEqual(isAlpha('a'), true)
			assert.strictEqual(isAlpha('Z'), true)
			assert.strictEqual(isAlpha('_'), true)
			assert.strictEqual(isAlpha('1'), false)
			assert.strictEqual(isAlpha('ß'), false)
		})

		it('should combine both for identifier bodies', () => {
			assert.strictEqual(isAlphaNumeric('x'), true)
			assert.strictEqual(isAlphaNumeric('4'), true)
			assert.strictEqual(isAlphaNumeric('-'), false)
		})
	})
})
