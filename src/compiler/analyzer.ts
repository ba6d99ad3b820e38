// Semantic analyzer. Validates declarations (fatal), then derives a type for every expression.
// Functions are handled in declaration order: each one is validated and then its body checked,
// stopping after the first body that records a type error.

import type {
	BinaryOp,
	Block,
	CallExpr,
	Expr,
	FuncDecl,
	Literal,
	Program,
	Stmt,
	UnaryOp,
	VarDecl,
} from "./ast"
import { CompileError, CompileErrorList } from "./errors"
import type { TraceLog } from "./trace-log"
import {
	CHAR,
	CHAR_ARRAY,
	ERROR,
	FLOAT,
	INT,
	type TypeInfo,
	VOID,
	isError,
	isIntScalar,
	isNumericScalar,
	typeEq,
	typeToString,
} from "./types"

// --- Public interfaces ---

export interface AnalysisResult {
	/** Derived type of every expression node, keyed by node. */
	readonly exprTypes: Map<Expr, TypeInfo>
	/** Root causes of expressions whose type is error. */
	readonly errors: CompileErrorList
}

export interface AnalyzeOptions {
	readonly log?: TraceLog
}

// --- Standard library ---

export const STDLIB: readonly [string, readonly TypeInfo[], TypeInfo][] = [
	["getchar", [], INT],
	["putchar", [INT], INT],
	["getint", [], INT],
	["putint", [INT], VOID],
	["getfloat", [], FLOAT],
	["putfloat", [FLOAT], FLOAT],
	["putstring", [CHAR_ARRAY], VOID],
]

const LITERAL_TYPES: Record<Literal["literal"], TypeInfo> = {
	int: INT,
	char: CHAR,
	real: FLOAT,
	string: CHAR_ARRAY,
}

// --- Entry point ---

/**
 * Analyze a parsed program. Declaration errors throw a CompileError; type
 * errors are recorded in the result and leave the node typed as error.
 * Functions after the first one with a type error are not analyzed.
 */
export function analyze(program: Program, options: AnalyzeOptions = {}): AnalysisResult {
	const a = new Analyzer(program, options.log)
	return a.analyze()
}

// --- Analyzer ---

/** What a function body can see while it is checked. */
interface FunctionScope {
	readonly fn: FuncDecl
	/** Functions declared up to and including `fn`. */
	readonly callable: readonly FuncDecl[]
}

function varType(v: VarDecl): TypeInfo {
	return { type: v.type, isArray: v.isArray }
}

class Analyzer {
	private errors = new CompileErrorList()
	private exprTypes = new Map<Expr, TypeInfo>()

	private program: Program
	private log: TraceLog | undefined

	constructor(program: Program, log: TraceLog | undefined) {
		this.program = program
		this.log = log
	}

	analyze(): AnalysisResult {
		this.log?.phase("analyze")
		this.validateGlobals()

		const funcs = this.program.funcs
		for (let i = 0; i < funcs.length; i++) {
			const fn = funcs[i]
			if (fn === undefined) continue
			// The run ends at its first error, so later declarations go unchecked
			if (this.errors.hasErrors()) break
			const earlier = funcs.slice(0, i)
			this.validateFunction(fn, earlier)
			this.checkBlock(fn.body, { fn, callable: [...earlier, fn] })
		}

		return { exprTypes: this.exprTypes, errors: this.errors }
	}

	// --- Declaration validation ---

	private validateGlobals(): void {
		const globals = this.program.globals
		globals.forEach((v, i) => {
			if (v.type === "void") {
				throw CompileError.at("declaration", v.lexeme, "variables cannot have type void")
			}
			if (globals.slice(0, i).some((prev) => prev.name === v.name)) {
				throw CompileError.at("declaration", v.lexeme, "variable redeclared")
			}
		})
	}

	private validateFunction(fn: FuncDecl, earlier: readonly FuncDecl[]): void {
		fn.locals.forEach((v, i) => {
			if (v.type === "void") {
				throw CompileError.at("declaration", v.lexeme, "variables cannot have type void")
			}
			if (fn.locals.slice(0, i).some((prev) => prev.name === v.name)) {
				throw CompileError.at("declaration", v.lexeme, "variable redeclared")
			}
			if (fn.params.some((p) => p.name === v.name)) {
				throw CompileError.at(
					"declaration",
					v.lexeme,
					"variable cannot have the same name as a parameter",
				)
			}
		})

		fn.params.forEach((p, i) => {
			if (p.type === "void") {
				throw CompileError.at("declaration", p.lexeme, "parameters cannot have type void")
			}
			if (fn.params.slice(0, i).some((prev) => prev.name === p.name)) {
				throw CompileError.at("declaration", p.lexeme, "parameter redeclared")
			}
		})

		if (earlier.some((prev) => prev.name === fn.name)) {
			throw CompileError.at("declaration", fn.lexeme, "function with the same name already exists")
		}
	}

	// --- Symbol lookup ---

	private lookupVariable(name: string, scope: FunctionScope): VarDecl | undefined {
		return (
			scope.fn.params.find((p) => p.name === name) ??
			scope.fn.locals.find((v) => v.name === name) ??
			this.program.globals.find((g) => g.name === name)
		)
	}

	// --- Statements ---

	private checkBlock(block: Block, scope: FunctionScope): void {
		for (const stmt of block.stmts) {
			this.checkStmt(stmt, scope)
		}
	}

	private checkStmt(stmt: Stmt, scope: FunctionScope): void {
		switch (stmt.kind) {
			case "Block":
				this.checkBlock(stmt, scope)
				break
			case "BreakStmt":
			case "ContinueStmt":
				break
			case "ReturnStmt":
				if (stmt.value) this.checkExpr(stmt.value, scope)
				break
			case "IfStmt":
				this.checkExpr(stmt.condition, scope)
				this.checkBlock(stmt.then, scope)
				if (stmt.else_) this.checkBlock(stmt.else_, scope)
				break
			case "ForStmt":
				if (stmt.init) this.checkExpr(stmt.init, scope)
				if (stmt.condition) this.checkExpr(stmt.condition, scope)
				if (stmt.update) this.checkExpr(stmt.update, scope)
				this.checkBlock(stmt.body, scope)
				break
			case "WhileStmt":
				this.checkExpr(stmt.condition, scope)
				this.checkBlock(stmt.body, scope)
				break
			case "DoWhileStmt":
				this.checkBlock(stmt.body, scope)
				this.checkExpr(stmt.condition, scope)
				break
			default:
				this.checkExpr(stmt, scope)
		}
	}

	// --- Expressions ---

	private checkExpr(expr: Expr, scope: FunctionScope): TypeInfo {
		const type = this.deriveType(expr, scope)
		this.exprTypes.set(expr, type)
		return type
	}

	private deriveType(expr: Expr, scope: FunctionScope): TypeInfo {
		switch (expr.kind) {
			case "Literal":
				return LITERAL_TYPES[expr.literal]

			case "Ident": {
				const v = this.lookupVariable(expr.name, scope)
				if (!v) return this.typeError(expr, `undeclared identifier '${expr.name}'`)
				return varType(v)
			}

			case "IndexAccess": {
				const index = this.checkExpr(expr.index, scope)
				const v = this.lookupVariable(expr.name, scope)
				if (!v) return this.typeError(expr, `undeclared identifier '${expr.name}'`)
				if (isError(index)) return ERROR
				if (!v.isArray) return this.typeError(expr, `'${expr.name}' is not an array`)
				if (!isIntScalar(index)) {
					return this.typeError(expr, `array index must be int, got ${typeToString(index)}`)
				}
				return { type: v.type, isArray: false }
			}

			case "UnaryExpr": {
				const operand = this.checkExpr(expr.operand, scope)
				if (isError(operand)) return ERROR
				return this.checkUnaryExpr(expr.op, operand, expr)
			}

			case "CastExpr": {
				const operand = this.checkExpr(expr.operand, scope)
				if (isError(operand)) return ERROR
				if (expr.target === "void") return VOID
				if (isNumericScalar(operand)) return { type: expr.target, isArray: false }
				return this.typeError(expr, `cannot cast ${typeToString(operand)} to ${expr.target}`)
			}

			case "AssignExpr": {
				const target = this.checkExpr(expr.target, scope)
				const value = this.checkExpr(expr.value, scope)
				if (isError(target) || isError(value)) return ERROR
				if (target.isArray) {
					return this.typeError(expr, `cannot assign to array '${expr.target.name}'`)
				}
				if (expr.op !== "=" && !isNumericScalar(target)) {
					return this.typeError(
						expr,
						`'${expr.op}' requires a numeric operand, got ${typeToString(target)}`,
					)
				}
				if (!typeEq(target, value)) {
					return this.typeError(
						expr,
						`cannot assign ${typeToString(value)} to ${typeToString(target)}`,
					)
				}
				return target
			}

			case "BinaryExpr": {
				const left = this.checkExpr(expr.left, scope)
				const right = this.checkExpr(expr.right, scope)
				if (isError(left) || isError(right)) return ERROR
				return this.checkBinaryExpr(expr.op, left, right, expr)
			}

			case "TernaryExpr": {
				const condition = this.checkExpr(expr.condition, scope)
				const then = this.checkExpr(expr.then, scope)
				const else_ = this.checkExpr(expr.else_, scope)
				if (isError(condition) || isError(then) || isError(else_)) return ERROR
				if (!isIntScalar(condition)) {
					return this.typeError(expr, `condition must be int, got ${typeToString(condition)}`)
				}
				if (!typeEq(then, else_)) {
					return this.typeError(
						expr,
						`branches have different types: ${typeToString(then)} and ${typeToString(else_)}`,
					)
				}
				return then
			}

			case "CallExpr":
				return this.checkCallExpr(expr, scope)
		}
	}

	private checkUnaryExpr(op: UnaryOp, operand: TypeInfo, expr: Expr): TypeInfo {
		switch (op) {
			case "+":
			case "-":
			case "++":
			case "--":
				if (isNumericScalar(operand)) return operand
				return this.typeError(expr, `'${op}' requires a numeric operand, got ${typeToString(operand)}`)
			case "!":
			case "~":
				if (isIntScalar(operand)) return INT
				return this.typeError(expr, `'${op}' requires an int operand, got ${typeToString(operand)}`)
			case "&":
				// Address of a scalar: modelled as an array of its type
				if (!operand.isArray && operand.type !== "void") {
					return { type: operand.type, isArray: true }
				}
				return this.typeError(expr, `cannot take the address of ${typeToString(operand)}`)
			case "*":
				if (operand.isArray) return { type: operand.type, isArray: false }
				return this.typeError(expr, `cannot dereference ${typeToString(operand)}`)
		}
	}

	private checkBinaryExpr(op: BinaryOp, left: TypeInfo, right: TypeInfo, expr: Expr): TypeInfo {
		switch (op) {
			case "+":
			case "-":
			case "*":
			case "/":
				if (isNumericScalar(left) && typeEq(left, right)) return left
				break
			case "%":
			case "&":
			case "|":
			case "&&":
			case "||":
				if (isIntScalar(left) && isIntScalar(right)) return INT
				break
			default:
				// Comparisons
				if (isNumericScalar(left) && typeEq(left, right)) return INT
		}
		return this.typeError(
			expr,
			`'${op}' cannot combine ${typeToString(left)} and ${typeToString(right)}`,
		)
	}

	/**
	 * Resolve a call against user functions declared so far, then the
	 * standard library. Argument types must match exactly.
	 */
	private checkCallExpr(expr: CallExpr, scope: FunctionScope): TypeInfo {
		const args = expr.args.map((arg) => this.checkExpr(arg, scope))
		if (args.some(isError)) return ERROR

		const matches = (params: readonly TypeInfo[]) =>
			params.length === args.length &&
			params.every((p, i) => {
				const arg = args[i]
				return arg !== undefined && typeEq(p, arg)
			})

		const user = scope.callable.find((f) => f.name === expr.callee && matches(f.params.map(varType)))
		if (user) {
			this.log?.resolve(expr.callee, "user", expr.lexeme.line)
			return { type: user.returnType, isArray: false }
		}

		const lib = STDLIB.find(([name, params]) => name === expr.callee && matches(params))
		if (lib) {
			this.log?.resolve(expr.callee, "stdlib", expr.lexeme.line)
			return lib[2]
		}

		this.log?.resolve(expr.callee, "none", expr.lexeme.line)
		return this.typeError(
			expr,
			`no matching function for call to '${expr.callee}(${args.map(typeToString).join(", ")})'`,
		)
	}

	// --- Error helpers ---

	private typeError(expr: Expr, message: string): TypeInfo {
		this.errors.add("type", expr.lexeme, message)
		this.log?.typeError(message, expr.lexeme.line)
		return ERROR
	}
}
