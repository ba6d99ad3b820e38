export { Lexer } from "./lexer"
export { LexemeCursor } from "./cursor"
export { Parser, parse, DEFAULT_MAX_DEPTH } from "./parser"
export type { ParseOptions } from "./parser"
export { TokenKind } from "./token"
export type { Lexeme } from "./token"
export type {
	Program,
	VarDecl,
	FuncDecl,
	DeclRecord,
	DeclKind,
	Stmt,
	Block,
	Expr,
	LValue,
} from "./ast"
export { isExpr } from "./ast"
export type { Diagnostic, Phase } from "./errors"
export { CompileError, CompileErrorList, formatDiagnostic } from "./errors"
export { analyze, STDLIB } from "./analyzer"
export type { AnalysisResult, AnalyzeOptions } from "./analyzer"
export { compile } from "./compile"
export type { CompileOptions, CompileResult } from "./compile"
export { declarationReport, typeReport } from "./reports"
export { createTraceLog, formatTraceMessage } from "./trace-log"
export type {
	TraceLog,
	TraceMessage,
	PhaseMessage,
	DeclareMessage,
	ResolveMessage,
	TypeErrorMessage,
} from "./trace-log"
export type { BaseType, DerivedType, TypeInfo } from "./types"
export { INT, CHAR, FLOAT, VOID, ERROR, CHAR_ARRAY, baseTypeOf, typeEq, typeToString } from "./types"
