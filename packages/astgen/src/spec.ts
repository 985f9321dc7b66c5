import { AstSpecError } from './errors.ts'

export interface FieldSpec {
	readonly name: string
	readonly type: string
}

export interface VariantSpec {
	readonly name: string
	readonly fields: readonly FieldSpec[]
}

const TYPE_NAME = /^[A-Z][A-Za-z0-9]*$/
const FIELD_NAME = /^[A-Za-z_$][\w$]*$/

const OPENERS = '<([{'
const CLOSERS = '>)]}'

/**
 * Split on commas that are not nested inside `<>`, `()`, `[]` or `{}`,
 * so `Map<string, Expr>` stays one entry.
 */
export function splitTopLevel(text: string): string[] {
	const parts: string[] = []
	let depth = 0
	let start = 0

	for (let i = 0; i < text.length; i++) {
		const char = text.charAt(i)
		if (OPENERS.includes(char)) depth++
		else if (CLOSERS.includes(char) && depth > 0) depth--
		else if (char === ',' && depth === 0) {
			parts.push(text.slice(start, i))
			start = i + 1
		}
	}
	parts.push(text.slice(start))
	return parts
}

function parseField(raw: string, variant: string): FieldSpec {
	const field = raw.trim()
	const colon = field.indexOf(':')
	if (colon === -1) {
		throw new AstSpecError('LXGEN002', { field, variant })
	}

	const name = field.slice(0, colon).trim()
	const type = field.slice(colon + 1).trim()
	if (!FIELD_NAME.test(name) || type.length === 0) {
		throw new AstSpecError('LXGEN002', { field, variant })
	}
	return { name, type }
}

/**
 * Parse one variant written as `Name : field: Type, field: Type`.
 * The variant name ends at the first `:`; a variant may have no fields.
 *
 * @example
 * parseVariantSpec('Unary : operator: Token, right: Expr')
 * // { name: 'Unary', fields: [{ name: 'operator', type: 'Token' }, { name: 'right', type: 'Expr' }] }
 */
export function parseVariantSpec(spec: string): VariantSpec {
	const colon = spec.indexOf(':')
	if (colon === -1) {
		throw new AstSpecError('LXGEN001', { detail: 'missing ":" after the variant name', spec })
	}

	const name = spec.slice(0, colon).trim()
	if (!TYPE_NAME.test(name)) {
		throw new AstSpecError('LXGEN001', { detail: 'variant name must be a PascalCase identifier', spec })
	}

	const fieldList = spec.slice(colon + 1).trim()
	const fields = fieldList.length === 0 ? [] : splitTopLevel(fieldList).map((f) => parseField(f, name))
	return { fields, name }
}

export function isTypeName(name: string): boolean {
	return TYPE_NAME.test(name)
}
