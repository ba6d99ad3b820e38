// Shared helpers for the front-end tests.

import { type Expr, type FuncDecl, type Program, type Stmt, isExpr } from "../ast"
import { CompileError, type Diagnostic } from "../errors"
import { Lexer } from "../lexer"
import { type ParseOptions, parse } from "../parser"

export function parseSource(source: string, options?: ParseOptions): Program {
	return parse(new Lexer(source, "test.c").tokenize(), options)
}

/** Run `fn` and return the diagnostic of the CompileError it throws. */
export function diagnosticOf(fn: () => unknown): Diagnostic {
	try {
		fn()
	} catch (err) {
		if (err instanceof CompileError) return err.diagnostic
		throw err
	}
	throw new Error("expected a CompileError")
}

export function funcNamed(program: Program, name: string): FuncDecl {
	const fn = program.funcs.find((f) => f.name === name)
	if (!fn) throw new Error(`no function '${name}'`)
	return fn
}

/** Top-level statements of `void f() { <body> }`. */
export function bodyOf(body: string): Stmt[] {
	return funcNamed(parseSource(`void f() { ${body} }`), "f").body.stmts
}

export function firstStmt(body: string): Stmt {
	const stmt = bodyOf(body)[0]
	if (!stmt) throw new Error("empty body")
	return stmt
}

/** The single expression statement `<source>;`, rendered with `show`. */
export function parseExpr(source: string): string {
	const stmt = firstStmt(`${source};`)
	if (!isExpr(stmt)) throw new Error(`not an expression: ${stmt.kind}`)
	return show(stmt)
}

/** Render an expression as a fully parenthesized prefix string. */
export function show(expr: Expr): string {
	switch (expr.kind) {
		case "Literal":
			return expr.lexeme.text
		case "Ident":
			return expr.name
		case "IndexAccess":
			return `${expr.name}[${show(expr.index)}]`
		case "UnaryExpr":
			return expr.postfix ? `(${show(expr.operand)} ${expr.op})` : `(${expr.op} ${show(expr.operand)})`
		case "CastExpr":
			return `(cast ${expr.target} ${show(expr.operand)})`
		case "AssignExpr":
			return `(${expr.op} ${show(expr.target)} ${show(expr.value)})`
		case "BinaryExpr":
			return `(${expr.op} ${show(expr.left)} ${show(expr.right)})`
		case "TernaryExpr":
			return `(? ${show(expr.condition)} ${show(expr.then)} ${show(expr.else_)})`
		case "CallExpr":
			return `${expr.callee}(${expr.args.map(show).join(", ")})`
	}
}
