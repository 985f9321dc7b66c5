/**
 * @loxlex/diagnostics
 *
 * Diagnostic catalogs shared by the loxlex packages.
 */

export {
	ASTGEN_DIAGNOSTICS,
	type AstgenDiagnosticCode,
	LXGEN001,
	LXGEN002,
	LXGEN003,
} from './astgen.ts'
export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	LXCLI001,
	LXCLI002,
	LXCLI003,
	LXCLI004,
	LXCLI005,
	LXCLI006,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	LXSCAN001,
	LXSCAN002,
	SCANNER_DIAGNOSTICS,
	type ScannerDiagnosticCode,
} from './scanner.ts'
export type { DiagnosticArgs, DiagnosticDef } from './types.ts'

import { interpolateMessage } from './interpolate.ts'
import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Render a catalog entry as `[CODE] message`, filling the message template.
 */
export function formatCatalogMessage(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
