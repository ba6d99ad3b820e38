// AST node definitions for the language.
// Nodes form a strict tree; each keeps the lexeme it came from for diagnostics and reports.

import type { Lexeme } from "./token"
import type { BaseType } from "./types"

// --- Declarations ---

export type DeclKind = "global variable" | "function" | "parameter" | "local variable"

/** One declared identifier, in the order the parser met it. */
export interface DeclRecord {
	readonly kind: DeclKind
	readonly name: string
	readonly file: string
	readonly line: number
}

export interface VarDecl {
	readonly kind: "VarDecl"
	readonly name: string
	readonly type: BaseType
	// Set when `[N]` or `[]` follows the name
	isArray: boolean
	readonly lexeme: Lexeme
}

export interface FuncDecl {
	readonly kind: "FuncDecl"
	readonly name: string
	readonly returnType: BaseType
	readonly params: VarDecl[]
	readonly locals: VarDecl[]
	readonly body: Block
	readonly lexeme: Lexeme
}

export interface Program {
	readonly kind: "Program"
	readonly globals: VarDecl[]
	readonly funcs: FuncDecl[]
	readonly decls: DeclRecord[]
}

// --- Statements ---

export type Stmt =
	| BreakStmt
	| ContinueStmt
	| ReturnStmt
	| IfStmt
	| ForStmt
	| WhileStmt
	| DoWhileStmt
	| Block
	| Expr

export interface Block {
	readonly kind: "Block"
	readonly stmts: Stmt[]
	readonly lexeme: Lexeme
}

export interface BreakStmt {
	readonly kind: "BreakStmt"
	readonly lexeme: Lexeme
}

export interface ContinueStmt {
	readonly kind: "ContinueStmt"
	readonly lexeme: Lexeme
}

export interface ReturnStmt {
	readonly kind: "ReturnStmt"
	readonly value: Expr | null
	readonly lexeme: Lexeme
}

export interface IfStmt {
	readonly kind: "IfStmt"
	readonly condition: Expr
	readonly then: Block
	readonly else_: Block | null
	readonly lexeme: Lexeme
}

export interface ForStmt {
	readonly kind: "ForStmt"
	readonly init: Expr | null
	readonly condition: Expr | null
	readonly update: Expr | null
	readonly body: Block
	readonly lexeme: Lexeme
}

export interface WhileStmt {
	readonly kind: "WhileStmt"
	readonly condition: Expr
	readonly body: Block
	readonly lexeme: Lexeme
}

export interface DoWhileStmt {
	readonly kind: "DoWhileStmt"
	readonly body: Block
	readonly condition: Expr
	readonly lexeme: Lexeme
}

// --- Expressions ---

export type Expr =
	| Literal
	| Ident
	| IndexAccess
	| UnaryExpr
	| CastExpr
	| AssignExpr
	| BinaryExpr
	| TernaryExpr
	| CallExpr

export type LValue = Ident | IndexAccess

export interface Literal {
	readonly kind: "Literal"
	readonly literal: "int" | "char" | "real" | "string"
	readonly lexeme: Lexeme
}

export interface Ident {
	readonly kind: "Ident"
	readonly name: string
	readonly lexeme: Lexeme
}

export interface IndexAccess {
	readonly kind: "IndexAccess"
	readonly name: string
	readonly index: Expr
	readonly lexeme: Lexeme
}

export type UnaryOp = "&" | "*" | "+" | "-" | "~" | "!" | "++" | "--"

export interface UnaryExpr {
	readonly kind: "UnaryExpr"
	readonly op: UnaryOp
	readonly postfix: boolean
	readonly operand: Expr
	readonly lexeme: Lexeme
}

export interface CastExpr {
	readonly kind: "CastExpr"
	readonly target: BaseType
	readonly operand: Expr
	readonly lexeme: Lexeme
}

export type AssignOp = "=" | "*=" | "/=" | "+=" | "-="

export interface AssignExpr {
	readonly kind: "AssignExpr"
	readonly op: AssignOp
	readonly target: LValue
	readonly value: Expr
	readonly lexeme: Lexeme
}

export type BinaryOp =
	| "||"
	| "&&"
	| "|"
	| "&"
	| "=="
	| "!="
	| "<"
	| "<="
	| ">"
	| ">="
	| "+"
	| "-"
	| "*"
	| "/"
	| "%"

export interface BinaryExpr {
	readonly kind: "BinaryExpr"
	readonly op: BinaryOp
	readonly left: Expr
	readonly right: Expr
	readonly lexeme: Lexeme
}

export interface TernaryExpr {
	readonly kind: "TernaryExpr"
	readonly condition: Expr
	readonly then: Expr
	readonly else_: Expr
	readonly lexeme: Lexeme
}

export interface CallExpr {
	readonly kind: "CallExpr"
	readonly callee: string
	readonly args: Expr[]
	readonly lexeme: Lexeme
}

const EXPR_KINDS = new Set<string>([
	"Literal",
	"Ident",
	"IndexAccess",
	"UnaryExpr",
	"CastExpr",
	"AssignExpr",
	"BinaryExpr",
	"TernaryExpr",
	"CallExpr",
])

export function isExpr(stmt: Stmt): stmt is Expr {
	return EXPR_KINDS.has(stmt.kind)
}
