/**
 * AST generator diagnostic definitions.
 *
 * Error code format: LXGEN<NUMBER>
 */

import type { DiagnosticDef } from './types.ts'

export const LXGEN001: DiagnosticDef = {
	code: 'LXGEN001',
	message: 'malformed variant "{spec}": {detail}',
}

export const LXGEN002: DiagnosticDef = {
	code: 'LXGEN002',
	message: 'malformed field "{field}" in variant {variant}',
}

export const LXGEN003: DiagnosticDef = {
	code: 'LXGEN003',
	message: 'duplicate variant {variant} in {baseName}',
}

export const ASTGEN_DIAGNOSTICS = {
	LXGEN001,
	LXGEN002,
	LXGEN003,
} as const

export type AstgenDiagnosticCode = keyof typeof ASTGEN_DIAGNOSTICS
