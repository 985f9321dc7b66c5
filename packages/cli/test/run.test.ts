import assert from 'node:assert'
import { describe, it } from 'node:test'
import { runSource } from '../src/run.ts'

describe('runSource', () => {
	it('should render tokens and report no error for clean input', () => {
		const outcome = runSource('1 // two\n3', 'text')
		assert.deepStrictEqual(outcome, {
			errors: [],
			hadError: false,
			output: ['NUMBER 1 1', 'NUMBER 3 3', 'EOF  null'],
		})
	})

	it('should format diagnostics and flag the error', () => {
		const outcome = runSource('x = "abc', 'text')
		assert.deepStrictEqual(outcome, {
			errors: ['[line 1] Error: Unterminated string.'],
			hadError: true,
			output: ['IDENTIFIER x null', 'EQUAL = null', 'EOF  null'],
		})
	})

	it('should render JSON when asked', () => {
		const outcome = runSource('nil', 'json')
		assert.strictEqual(outcome.output.length, 1)
		assert.deepStrictEqual(JSON.parse(outcome.output[0] ?? ''), [
			{ column: 1, kind: 'NIL', lexeme: 'nil', line: 1, literal: null },
			{ column: 4, kind: 'EOF', lexeme: '', line: 1, literal: null },
		])
	})
})
