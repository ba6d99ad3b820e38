// Text reports produced after a successful run.

import type { AnalysisResult } from "./analyzer"
import { type Program, isExpr } from "./ast"
import { ERROR, typeToString } from "./types"

/** One line per declared identifier, in source order. */
export function declarationReport(program: Program): string[] {
	return program.decls.map((d) => `File ${d.file} Line ${d.line}: ${d.kind} ${d.name}`)
}

/**
 * One line per expression statement at the top level of each function
 * body. Control-flow statements are not listed.
 */
export function typeReport(program: Program, analysis: AnalysisResult): string[] {
	const lines: string[] = []
	for (const fn of program.funcs) {
		for (const stmt of fn.body.stmts) {
			if (!isExpr(stmt)) continue
			const type = analysis.exprTypes.get(stmt) ?? ERROR
			lines.push(
				`File ${stmt.lexeme.file} Line ${stmt.lexeme.line}: expression has type ${typeToString(type)}`,
			)
		}
	}
	return lines
}
