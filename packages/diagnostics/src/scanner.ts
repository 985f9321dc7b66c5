/**
 * Scanner diagnostic definitions.
 *
 * Error code format: LXSCAN<NUMBER>
 * - LXSCAN: Lexical errors (001-099)
 */

import type { DiagnosticDef } from './types.ts'

// =============================================================================
// LEXICAL ERRORS (LXSCAN001-099)
// =============================================================================

export const LXSCAN001: DiagnosticDef = {
	code: 'LXSCAN001',
	message: "Unexpected character '{character}'.",
}

export const LXSCAN002: DiagnosticDef = {
	code: 'LXSCAN002',
	message: 'Unterminated string.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all scanner diagnostics.
 */
export const SCANNER_DIAGNOSTICS = {
	LXSCAN001,
	LXSCAN002,
} as const

export type ScannerDiagnosticCode = keyof typeof SCANNER_DIAGNOSTICS
