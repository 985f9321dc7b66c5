import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Interpolate template arguments into a message.
 * `{key}` is replaced by `args[key]`; unknown keys are left as written,
 * so `Unexpected character '{character}'.` stays readable without args.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(PLACEHOLDER, (placeholder, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}
