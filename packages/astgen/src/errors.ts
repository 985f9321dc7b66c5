import {
	type AstgenDiagnosticCode,
	ASTGEN_DIAGNOSTICS,
	type DiagnosticArgs,
	type DiagnosticDef,
	formatCatalogMessage,
} from '@loxlex/diagnostics'

/**
 * Thrown when a node definition can't be turned into source.
 * The message is the catalog message, prefixed with its code.
 */
export class AstSpecError extends Error {
	readonly code: AstgenDiagnosticCode
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs

	constructor(code: AstgenDiagnosticCode, args: DiagnosticArgs) {
		const def = ASTGEN_DIAGNOSTICS[code]
		super(formatCatalogMessage(def, args))
		this.name = 'AstSpecError'
		this.code = code
		this.def = def
		this.args = args
	}
}
