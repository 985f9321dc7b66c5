/**
 * CLI diagnostic definitions.
 *
 * Error code format: LXCLI<NUMBER>
 * - LXCLI: CLI errors (001-099)
 */

import type { DiagnosticDef } from './types.ts'

// =============================================================================
// CLI ERRORS (LXCLI001-099)
// =============================================================================

export const LXCLI001: DiagnosticDef = {
	code: 'LXCLI001',
	message: 'Usage: {usage}',
}

export const LXCLI002: DiagnosticDef = {
	code: 'LXCLI002',
	message: 'file not found: {path}',
}

export const LXCLI003: DiagnosticDef = {
	code: 'LXCLI003',
	message: 'cannot read file: {reason}',
}

export const LXCLI004: DiagnosticDef = {
	code: 'LXCLI004',
	message: 'cannot write file: {reason}',
}

export const LXCLI005: DiagnosticDef = {
	code: 'LXCLI005',
	message: 'unknown format "{format}"',
}

export const LXCLI006: DiagnosticDef = {
	code: 'LXCLI006',
	message: 'command failed: {reason}',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	LXCLI001,
	LXCLI002,
	LXCLI003,
	LXCLI004,
	LXCLI005,
	LXCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
