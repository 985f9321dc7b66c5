/**
 * Re-export diagnostic types and scanner definitions from shared package.
 */

import { SCANNER_DIAGNOSTICS } from '@loxlex/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
	LXSCAN001,
	LXSCAN002,
	SCANNER_DIAGNOSTICS,
} from '@loxlex/diagnostics'

/**
 * All diagnostic codes the scanner can report.
 */
export type DiagnosticCode = keyof typeof SCANNER_DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof SCANNER_DIAGNOSTICS)[typeof code] {
	return SCANNER_DIAGNOSTICS[code]
}
