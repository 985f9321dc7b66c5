import assert from 'node:assert'
import { describe, it } from 'node:test'
import { isKeyword, KEYWORDS, lookupKeyword } from '../../src/core/keywords.ts'
import { TokenKind } from '../../src/core/tokens.ts'

describe('core/keywords', () => {
	it('should hold the sixteen reserved words', () => {
		assert.deepStrictEqual(
			[...KEYWORDS.keys()],
			[
				'and',
				'class',
				'else',
				'false',
				'for',
				'fun',
				'if',
				'nil',
				'or',
				'print',
				'return',
				'super',
				'this',
				'true',
				'var',
				'while',
			]
		)
	})

	it('should map each word to its kind', () => {
		assert.strictEqual(lookupKeyword('class'), TokenKind.Class)
		assert.strictEqual(lookupKeyword('nil'), TokenKind.Nil)
		assert.strictEqual(lookupKeyword('while'), TokenKind.While)
	})

	it('should match case-sensitively', () => {
		assert.strictEqual(lookupKeyword('Var'), undefined)
		assert.strictEqual(isKeyword('WHILE'), false)
	})

	it('should not treat prefixes or extensions as keywords', () => {
		assert.strictEqual(isKeyword('fo'), false)
		assert.strictEqual(isKeyword('forest'), false)
	})

	it('should not find inherited object keys', () => {
		assert.strictEqual(lookupKeyword('constructor'), undefined)
		assert.strictEqual(isKeyword('toString'), false)
	})
})
