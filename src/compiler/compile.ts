/**
 * The front-end pipeline: lex → parse → analyze.
 *
 * Stops at the first diagnostic. Only internal errors escape as exceptions;
 * anything wrong with the source comes back in the result.
 */
import { type AnalysisResult, analyze } from "./analyzer"
import type { Program } from "./ast"
import { CompileError, type Diagnostic } from "./errors"
import { Lexer } from "./lexer"
import { type ParseOptions, parse } from "./parser"

export interface CompileOptions extends ParseOptions {
	/** Source file name stamped on every lexeme. */
	readonly file?: string
}

export interface CompileResult {
	readonly success: boolean
	/** The diagnostic that stopped the run. Absent on success. */
	readonly diagnostic?: Diagnostic
	/** Present, with `analysis`, when the run got as far as type derivation. */
	readonly program?: Program
	readonly analysis?: AnalysisResult
}

export function compile(source: string, options: CompileOptions = {}): CompileResult {
	try {
		options.log?.phase("lex")
		const lexemes = new Lexer(source, options.file).tokenize()
		const program = parse(lexemes, options)
		const analysis = analyze(program, options)

		const typeError = analysis.errors.first()
		if (typeError) {
			return { success: false, diagnostic: typeError, program, analysis }
		}
		return { success: true, program, analysis }
	} catch (err) {
		if (err instanceof CompileError) {
			return { success: false, diagnostic: err.diagnostic }
		}
		throw err
	}
}
