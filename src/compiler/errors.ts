import type { Lexeme } from "./token"

export type Phase = "lex" | "syntax" | "declaration" | "type"

export interface Diagnostic {
	readonly phase: Phase
	readonly message: string
	readonly file: string
	readonly line: number
	readonly text: string
}

export class CompileErrorList {
	readonly errors: Diagnostic[] = []

	add(phase: Phase, at: Lexeme, message: string): void {
		this.errors.push({ phase, message, file: at.file, line: at.line, text: at.text })
	}

	hasErrors(): boolean {
		return this.errors.length > 0
	}

	first(): Diagnostic | undefined {
		return this.errors[0]
	}
}

/** Thrown by the lexer, parser and declaration checks; ends the run. */
export class CompileError extends Error {
	readonly diagnostic: Diagnostic

	constructor(diagnostic: Diagnostic) {
		super(formatDiagnostic(diagnostic))
		this.name = "CompileError"
		this.diagnostic = diagnostic
	}

	static at(phase: Phase, at: Lexeme, message: string): CompileError {
		return new CompileError({ phase, message, file: at.file, line: at.line, text: at.text })
	}
}

const PHASE_LABELS: Record<Phase, string> = {
	lex: "Lexer",
	syntax: "Parser",
	declaration: "Type checking",
	type: "Type checking",
}

export function formatDiagnostic(d: Diagnostic): string {
	return `${PHASE_LABELS[d.phase]} error in file ${d.file} line ${d.line} at text ${d.text}\n\t${d.message}`
}
