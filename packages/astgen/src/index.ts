/**
 * @loxlex/astgen
 *
 * Build-time generator for syntax-tree node classes with visitor dispatch.
 */

export { AstSpecError } from './errors.ts'
export { EXPR_AST } from './expr.ts'
export { type AstDefinition, astFileName, defineAst } from './generate.ts'
export { type FieldSpec, parseVariantSpec, splitTopLevel, type VariantSpec } from './spec.ts'
