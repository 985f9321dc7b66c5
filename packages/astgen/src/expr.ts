import type { AstDefinition } from './generate.ts'

/** Expression nodes for the Lox parser. */
export const EXPR_AST: AstDefinition = {
	baseName: 'Expr',
	imports: ["import type { Token } from '@loxlex/scanner'"],
	variants: [
		'Binary   : left: Expr, operator: Token, right: Expr',
		'Grouping : expression: Expr',
		'Literal  : value: number | string | boolean | null',
		'Unary    : operator: Token, right: Expr',
	],
}
