import { AstSpecError } from './errors.ts'
import { type FieldSpec, isTypeName, parseVariantSpec, type VariantSpec } from './spec.ts'

/**
 * A family of node classes sharing one abstract base and one visitor.
 */
export interface AstDefinition {
	/** Base class name, e.g. `Expr` */
	readonly baseName: string
	/** Variant specs, e.g. `Binary : left: Expr, operator: Token, right: Expr` */
	readonly variants: readonly string[]
	/** Import lines placed at the top of the module */
	readonly imports?: readonly string[]
}

const HEADER = '// Generated by `loxlex generate-ast`. Edit the node definitions, not this file.'

class SourceWriter {
	private readonly lines: string[] = []

	line(text = '', indent = 0): void {
		this.lines.push(text === '' ? '' : `${'\t'.repeat(indent)}${text}`)
	}

	toString(): string {
		return `${this.lines.join('\n')}\n`
	}
}

function visitorName(baseName: string): string {
	return `${baseName}Visitor`
}

function visitMethodName(variant: VariantSpec, baseName: string): string {
	return `visit${variant.name}${baseName}`
}

function parameterName(baseName: string): string {
	return baseName.toLowerCase()
}

function defineVisitor(out: SourceWriter, baseName: string, variants: readonly VariantSpec[]): void {
	out.line(`export interface ${visitorName(baseName)}<R> {`)
	for (const variant of variants) {
		const method = visitMethodName(variant, baseName)
		out.line(`${method}(${parameterName(baseName)}: ${variant.name}): R`, 1)
	}
	out.line('}')
}

function defineBase(out: SourceWriter, baseName: string): void {
	out.line(`export abstract class ${baseName} {`)
	out.line(`abstract accept<R>(visitor: ${visitorName(baseName)}<R>): R`, 1)
	out.line('}')
}

function defineConstructor(out: SourceWriter, fields: readonly FieldSpec[]): void {
	if (fields.length === 0) return

	out.line('constructor(', 1)
	fields.forEach((field, index) => {
		const separator = index < fields.length - 1 ? ',' : ''
		out.line(`readonly ${field.name}: ${field.type}${separator}`, 2)
	})
	out.line(') {', 1)
	out.line('super()', 2)
	out.line('}', 1)
	out.line()
}

function defineType(out: SourceWriter, baseName: string, variant: VariantSpec): void {
	out.line(`export class ${variant.name} extends ${baseName} {`)
	defineConstructor(out, variant.fields)
	out.line(`override accept<R>(visitor: ${visitorName(baseName)}<R>): R {`, 1)
	out.line(`return visitor.${visitMethodName(variant, baseName)}(this)`, 2)
	out.line('}', 1)
	out.line('}')
}

function parseVariants(definition: AstDefinition): VariantSpec[] {
	const seen = new Set<string>()
	return definition.variants.map((spec) => {
		const variant = parseVariantSpec(spec)
		if (seen.has(variant.name) || variant.name === definition.baseName) {
			throw new AstSpecError('LXGEN003', {
				baseName: definition.baseName,
				variant: variant.name,
			})
		}
		seen.add(variant.name)
		return variant
	})
}

/**
 * Render a TypeScript module for a node family: the visitor interface,
 * the abstract base with `accept`, and one class per variant whose
 * `accept` dispatches to its own visit method.
 */
export function defineAst(definition: AstDefinition): string {
	const { baseName } = definition
	if (!isTypeName(baseName)) {
		throw new AstSpecError('LXGEN001', {
			detail: 'base name must be a PascalCase identifier',
			spec: baseName,
		})
	}

	const variants = parseVariants(definition)
	const out = new SourceWriter()

	out.line(HEADER)
	out.line()
	for (const importLine of definition.imports ?? []) {
		out.line(importLine)
	}
	if (definition.imports !== undefined && definition.imports.length > 0) {
		out.line()
	}

	defineVisitor(out, baseName, variants)
	out.line()
	defineBase(out, baseName)

	for (const variant of variants) {
		out.line()
		defineType(out, baseName, variant)
	}

	return out.toString()
}

/** File the module for `baseName` is written to, e.g. `expr.ts`. */
export function astFileName(baseName: string): string {
	return `${baseName.toLowerCase()}.ts`
}
