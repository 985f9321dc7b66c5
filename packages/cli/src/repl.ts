import { createInterface } from 'node:readline'
import { runSource } from './run.ts'
import type { OutputFormat } from './utils.ts'

export const BANNER = 'loxlex REPL'
export const PROMPT = '> '

export interface TextSink {
	write(text: string): unknown
}

export interface PromptIO {
	readonly input: NodeJS.ReadableStream
	readonly output: TextSink
	readonly error: TextSink
}

/**
 * Scan one line at a time until input closes. Every line is a fresh scan,
 * so an error on one line never affects the next or ends the session.
 */
export async function runPrompt(io: PromptIO, format: OutputFormat = 'text'): Promise<void> {
	const lines = createInterface({ crlfDelay: Number.POSITIVE_INFINITY, input: io.input, terminal: false })

	io.output.write(`${BANNER}\n`)
	io.output.write(PROMPT)

	for await (const line of lines) {
		const outcome = runSource(line, format)
		for (const text of outcome.output) io.output.write(`${text}\n`)
		for (const text of outcome.errors) io.error.write(`${text}\n`)
		io.output.write(PROMPT)
	}

	io.output.write('\n')
}
