/**
 * One catalog entry: a stable code and a message template whose
 * `{placeholders}` are filled by `interpolateMessage`.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly message: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
