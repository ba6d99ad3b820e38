import type {
	AssignOp,
	BinaryOp,
	Block,
	CallExpr,
	DeclKind,
	DeclRecord,
	DoWhileStmt,
	Expr,
	ForStmt,
	FuncDecl,
	IfStmt,
	LValue,
	Program,
	ReturnStmt,
	Stmt,
	UnaryOp,
	VarDecl,
	WhileStmt,
} from "./ast"
import { LexemeCursor } from "./cursor"
import { CompileError } from "./errors"
import { type Lexeme, TokenKind } from "./token"
import type { TraceLog } from "./trace-log"
import { type BaseType, baseTypeOf } from "./types"

export const DEFAULT_MAX_DEPTH = 256

export interface ParseOptions {
	/** Deepest nesting of expressions and statement blocks before parsing fails. */
	readonly maxDepth?: number
	readonly log?: TraceLog
}

// Binary operator levels, lowest to highest precedence. Every level folds left.
const BINARY_LEVELS: readonly ReadonlyMap<TokenKind, BinaryOp>[] = [
	new Map<TokenKind, BinaryOp>([[TokenKind.PipePipe, "||"]]),
	new Map<TokenKind, BinaryOp>([[TokenKind.AmpAmp, "&&"]]),
	new Map<TokenKind, BinaryOp>([[TokenKind.Pipe, "|"]]),
	new Map<TokenKind, BinaryOp>([[TokenKind.Amp, "&"]]),
	new Map<TokenKind, BinaryOp>([
		[TokenKind.Eq, "=="],
		[TokenKind.NotEq, "!="],
	]),
	new Map<TokenKind, BinaryOp>([
		[TokenKind.Lt, "<"],
		[TokenKind.LtEq, "<="],
		[TokenKind.Gt, ">"],
		[TokenKind.GtEq, ">="],
	]),
	new Map<TokenKind, BinaryOp>([
		[TokenKind.Plus, "+"],
		[TokenKind.Minus, "-"],
	]),
	new Map<TokenKind, BinaryOp>([
		[TokenKind.Star, "*"],
		[TokenKind.Slash, "/"],
		[TokenKind.Percent, "%"],
	]),
]

function tokenToPrefixOp(kind: TokenKind): UnaryOp | null {
	switch (kind) {
		case TokenKind.Amp:
			return "&"
		case TokenKind.Star:
			return "*"
		case TokenKind.Plus:
			return "+"
		case TokenKind.Minus:
			return "-"
		case TokenKind.Tilde:
			return "~"
		case TokenKind.Bang:
			return "!"
		default:
			return null
	}
}

function tokenToAssignOp(kind: TokenKind): AssignOp | null {
	switch (kind) {
		case TokenKind.Assign:
			return "="
		case TokenKind.StarAssign:
			return "*="
		case TokenKind.SlashAssign:
			return "/="
		case TokenKind.PlusAssign:
			return "+="
		case TokenKind.MinusAssign:
			return "-="
		default:
			return null
	}
}

export class Parser {
	private cursor: LexemeCursor
	private globals: VarDecl[] = []
	private funcs: FuncDecl[] = []
	private decls: DeclRecord[] = []
	private depth = 0
	// Height of each expression node built so far; leaves are absent and count as 1
	private heights = new Map<Expr, number>()
	private maxDepth: number
	private log: TraceLog | undefined

	constructor(lexemes: readonly Lexeme[], options: ParseOptions = {}) {
		this.cursor = new LexemeCursor(lexemes)
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
		this.log = options.log
	}

	/** Parse the whole stream. Throws a CompileError at the first syntax error. */
	parse(): Program {
		this.log?.phase("parse")

		while (!this.cursor.isAtEnd()) {
			if (!this.cursor.check(TokenKind.Type)) {
				this.expected("function or global declaration")
			}
			const type = baseTypeOf(this.cursor.advance().text)
			const name = this.expectKind(TokenKind.Ident, "identifier")

			if (this.cursor.check(TokenKind.LParen)) {
				this.declare("function", name)
				this.cursor.advance()
				this.funcs.push(this.parseFunction(type, name))
			} else {
				const v = this.newVar(type, name)
				this.declare("global variable", name)
				this.globals.push(v)
				this.parseVarDeclTail(v, "global variable", this.globals)
			}
		}

		return { kind: "Program", globals: this.globals, funcs: this.funcs, decls: this.decls }
	}

	// --- Helpers ---

	private expected(what: string): never {
		throw CompileError.at("syntax", this.cursor.peek(), `Expected '${what}'`)
	}

	private expectKind(kind: TokenKind, what: string): Lexeme {
		if (!this.cursor.check(kind)) {
			this.expected(what)
		}
		return this.cursor.advance()
	}

	private match(kind: TokenKind): Lexeme | null {
		return this.cursor.check(kind) ? this.cursor.advance() : null
	}

	private declare(kind: DeclKind, at: Lexeme): void {
		this.decls.push({ kind, name: at.text, file: at.file, line: at.line })
		this.log?.declare(kind, at.text, at.line)
	}

	private newVar(type: BaseType, name: Lexeme): VarDecl {
		return { kind: "VarDecl", name: name.text, type, isArray: false, lexeme: name }
	}

	private nested<T>(parse: () => T): T {
		this.depth++
		if (this.depth > this.maxDepth) {
			throw CompileError.at("syntax", this.cursor.peek(), "expression too deeply nested")
		}
		const result = parse()
		this.depth--
		return result
	}

	/**
	 * Record the height of a new expression node. Left folds build trees
	 * without recursing, so the bound is checked on the tree as well as on
	 * the parser's own nesting.
	 */
	private node<T extends Expr>(expr: T, children: readonly Expr[]): T {
		const height = 1 + children.reduce((max, c) => Math.max(max, this.heights.get(c) ?? 1), 0)
		if (height > this.maxDepth) {
			throw CompileError.at("syntax", expr.lexeme, "expression too deeply nested")
		}
		this.heights.set(expr, height)
		return expr
	}

	// --- Declarations ---

	/**
	 * The rest of a variable declaration after its type and first name:
	 * sibling names after commas, `[N]` marking the preceding name an array,
	 * and the closing semicolon.
	 */
	private parseVarDeclTail(first: VarDecl, kind: DeclKind, into: VarDecl[]): void {
		let last = first
		while (!this.match(TokenKind.Semicolon)) {
			if (this.match(TokenKind.Comma)) {
				const name = this.expectKind(TokenKind.Ident, "identifier")
				last = this.newVar(first.type, name)
				this.declare(kind, name)
				into.push(last)
			} else if (this.match(TokenKind.LBracket)) {
				last.isArray = true
				this.expectKind(TokenKind.IntLit, "integer literal")
				this.expectKind(TokenKind.RBracket, "]")
			} else {
				this.expected(";")
			}
		}
	}

	private parseFunction(returnType: BaseType, name: Lexeme): FuncDecl {
		const params = this.parseParams()
		this.expectKind(TokenKind.RParen, ")")
		const open = this.expectKind(TokenKind.LBrace, "{")

		const fn: FuncDecl = {
			kind: "FuncDecl",
			name: name.text,
			returnType,
			params,
			locals: [],
			body: { kind: "Block", stmts: [], lexeme: open },
			lexeme: name,
		}
		this.parseBlockContents(fn, fn.body)
		this.expectKind(TokenKind.RBrace, "}")
		return fn
	}

	private parseParams(): VarDecl[] {
		const params: VarDecl[] = []
		if (this.cursor.check(TokenKind.RParen)) return params

		do {
			const type = baseTypeOf(this.expectKind(TokenKind.Type, "type").text)
			const name = this.expectKind(TokenKind.Ident, "identifier")
			const param = this.newVar(type, name)
			this.declare("parameter", name)
			if (this.match(TokenKind.LBracket)) {
				param.isArray = true
				this.expectKind(TokenKind.RBracket, "]")
			}
			params.push(param)
		} while (this.match(TokenKind.Comma))

		return params
	}

	// --- Statements ---

	/** Statements up to (not including) the closing brace. Local declarations are allowed here. */
	private parseBlockContents(fn: FuncDecl, block: Block): void {
		while (!this.cursor.check(TokenKind.RBrace)) {
			if (this.cursor.isAtEnd()) {
				this.expected("}")
			}

			if (this.cursor.check(TokenKind.Type)) {
				this.parseLocalDecl(fn)
				continue
			}

			const stmt = this.parseStmt(fn)
			if (stmt) block.stmts.push(stmt)
		}
	}

	private parseLocalDecl(fn: FuncDecl): void {
		const type = baseTypeOf(this.cursor.advance().text)
		const name = this.expectKind(TokenKind.Ident, "identifier")
		const v = this.newVar(type, name)
		this.declare("local variable", name)
		fn.locals.push(v)
		this.parseVarDeclTail(v, "local variable", fn.locals)
	}

	/** A brace-delimited block, or one statement wrapped as a block. */
	private parseStmtOrBlock(fn: FuncDecl): Block {
		return this.nested(() => {
			const start = this.cursor.peek()
			const block: Block = { kind: "Block", stmts: [], lexeme: start }
			if (this.match(TokenKind.LBrace)) {
				this.parseBlockContents(fn, block)
				this.expectKind(TokenKind.RBrace, "}")
			} else {
				const stmt = this.parseStmt(fn)
				if (stmt) block.stmts.push(stmt)
			}
			return block
		})
	}

	private parseStmt(fn: FuncDecl): Stmt | null {
		const tok = this.cursor.peek()

		switch (tok.kind) {
			case TokenKind.Semicolon:
				this.cursor.advance()
				return null
			case TokenKind.Break:
				this.cursor.advance()
				this.expectKind(TokenKind.Semicolon, ";")
				return { kind: "BreakStmt", lexeme: tok }
			case TokenKind.Continue:
				this.cursor.advance()
				this.expectKind(TokenKind.Semicolon, ";")
				return { kind: "ContinueStmt", lexeme: tok }
			case TokenKind.Return:
				return this.parseReturnStmt()
			case TokenKind.If:
				return this.parseIfStmt(fn)
			case TokenKind.For:
				return this.parseForStmt(fn)
			case TokenKind.While:
				return this.parseWhileStmt(fn)
			case TokenKind.Do:
				return this.parseDoWhileStmt(fn)
			default: {
				const expr = this.parseExpr()
				this.expectKind(TokenKind.Semicolon, ";")
				return expr
			}
		}
	}

	private parseReturnStmt(): ReturnStmt {
		const lexeme = this.cursor.advance()
		if (this.match(TokenKind.Semicolon)) {
			return { kind: "ReturnStmt", value: null, lexeme }
		}
		const value = this.parseExpr()
		this.expectKind(TokenKind.Semicolon, ";")
		return { kind: "ReturnStmt", value, lexeme }
	}

	private parseCondition(): Expr {
		this.expectKind(TokenKind.LParen, "(")
		const condition = this.parseExpr()
		this.expectKind(TokenKind.RParen, ")")
		return condition
	}

	private parseIfStmt(fn: FuncDecl): IfStmt {
		const lexeme = this.cursor.advance()
		const condition = this.parseCondition()
		const then = this.parseStmtOrBlock(fn)
		const else_ = this.match(TokenKind.Else) ? this.parseStmtOrBlock(fn) : null
		return { kind: "IfStmt", condition, then, else_, lexeme }
	}

	private parseForStmt(fn: FuncDecl): ForStmt {
		const lexeme = this.cursor.advance()
		this.expectKind(TokenKind.LParen, "(")
		const init = this.cursor.check(TokenKind.Semicolon) ? null : this.parseExpr()
		this.expectKind(TokenKind.Semicolon, ";")
		const condition = this.cursor.check(TokenKind.Semicolon) ? null : this.parseExpr()
		this.expectKind(TokenKind.Semicolon, ";")
		const update = this.cursor.check(TokenKind.RParen) ? null : this.parseExpr()
		this.expectKind(TokenKind.RParen, ")")
		const body = this.parseStmtOrBlock(fn)
		return { kind: "ForStmt", init, condition, update, body, lexeme }
	}

	private parseWhileStmt(fn: FuncDecl): WhileStmt {
		const lexeme = this.cursor.advance()
		const condition = this.parseCondition()
		const body = this.parseStmtOrBlock(fn)
		return { kind: "WhileStmt", condition, body, lexeme }
	}

	private parseDoWhileStmt(fn: FuncDecl): DoWhileStmt {
		const lexeme = this.cursor.advance()
		const body = this.parseStmtOrBlock(fn)
		this.expectKind(TokenKind.While, "while")
		const condition = this.parseCondition()
		// Trailing semicolon is optional
		this.match(TokenKind.Semicolon)
		return { kind: "DoWhileStmt", body, condition, lexeme }
	}

	// --- Expressions (precedence climbing) ---

	private parseExpr(): Expr {
		return this.nested(() => this.parseTernary())
	}

	private parseTernary(): Expr {
		let condition = this.parseBinary(0)

		// Folds left like the binary levels: a ? b : c ? d : e is (a ? b : c) ? d : e
		for (let q = this.match(TokenKind.Question); q; q = this.match(TokenKind.Question)) {
			const then = this.parseBinary(0)
			this.expectKind(TokenKind.Colon, ":")
			const else_ = this.parseBinary(0)
			condition = this.node({ kind: "TernaryExpr", condition, then, else_, lexeme: q }, [condition, then, else_])
		}

		return condition
	}

	private parseBinary(level: number): Expr {
		const ops = BINARY_LEVELS[level]
		if (ops === undefined) return this.parsePrimary()

		let left = this.parseBinary(level + 1)
		for (let op = ops.get(this.cursor.peek().kind); op !== undefined; op = ops.get(this.cursor.peek().kind)) {
			const lexeme = this.cursor.advance()
			const right = this.parseBinary(level + 1)
			left = this.node({ kind: "BinaryExpr", op, left, right, lexeme }, [left, right])
		}
		return left
	}

	private parsePrimary(): Expr {
		const tok = this.cursor.peek()

		switch (tok.kind) {
			case TokenKind.IntLit:
				this.cursor.advance()
				return { kind: "Literal", literal: "int", lexeme: tok }
			case TokenKind.CharLit:
				this.cursor.advance()
				return { kind: "Literal", literal: "char", lexeme: tok }
			case TokenKind.RealLit:
				this.cursor.advance()
				return { kind: "Literal", literal: "real", lexeme: tok }
			case TokenKind.StrLit:
				this.cursor.advance()
				return { kind: "Literal", literal: "string", lexeme: tok }

			case TokenKind.Ident:
				this.cursor.advance()
				if (this.cursor.check(TokenKind.LParen)) {
					return this.parseCall(tok)
				}
				return this.parseLValueTail(tok)

			case TokenKind.LParen: {
				this.cursor.advance()
				if (this.cursor.check(TokenKind.Type)) {
					const typeTok = this.cursor.advance()
					this.expectKind(TokenKind.RParen, ")")
					const operand = this.parseExpr()
					return this.node(
						{ kind: "CastExpr", target: baseTypeOf(typeTok.text), operand, lexeme: typeTok },
						[operand],
					)
				}
				const inner = this.parseExpr()
				this.expectKind(TokenKind.RParen, ")")
				return inner
			}

			case TokenKind.Incr:
			case TokenKind.Decr: {
				this.cursor.advance()
				const name = this.expectKind(TokenKind.Ident, "identifier")
				const operand = this.parseLValue(name)
				const op = tok.kind === TokenKind.Incr ? "++" : "--"
				return this.node({ kind: "UnaryExpr", op, postfix: false, operand, lexeme: tok }, [operand])
			}

			default: {
				const op = tokenToPrefixOp(tok.kind)
				if (op === null) {
					this.expected("identifier (within expression)")
				}
				this.cursor.advance()
				// The operand is a full expression: -a + b is -(a + b)
				const operand = this.parseExpr()
				return this.node({ kind: "UnaryExpr", op, postfix: false, operand, lexeme: tok }, [operand])
			}
		}
	}

	private parseCall(name: Lexeme): CallExpr {
		this.cursor.advance() // consume '('
		const args: Expr[] = []
		if (!this.cursor.check(TokenKind.RParen)) {
			args.push(this.parseExpr())
			while (this.match(TokenKind.Comma)) {
				args.push(this.parseExpr())
			}
		}
		this.expectKind(TokenKind.RParen, ")")
		return this.node({ kind: "CallExpr", callee: name.text, args, lexeme: name }, args)
	}

	private parseLValue(name: Lexeme): LValue {
		if (this.match(TokenKind.LBracket)) {
			const index = this.parseExpr()
			this.expectKind(TokenKind.RBracket, "]")
			return this.node({ kind: "IndexAccess", name: name.text, index, lexeme: name }, [index])
		}
		return { kind: "Ident", name: name.text, lexeme: name }
	}

	/** An lvalue, then at most one assignment or postfix increment. Assignment binds here, tighter than any binary operator. */
	private parseLValueTail(name: Lexeme): Expr {
		const target = this.parseLValue(name)

		const assignOp = tokenToAssignOp(this.cursor.peek().kind)
		if (assignOp) {
			const lexeme = this.cursor.advance()
			const value = this.parseExpr()
			return this.node({ kind: "AssignExpr", op: assignOp, target, value, lexeme }, [target, value])
		}

		if (this.cursor.check(TokenKind.Incr) || this.cursor.check(TokenKind.Decr)) {
			const lexeme = this.cursor.advance()
			const op = lexeme.kind === TokenKind.Incr ? "++" : "--"
			return this.node({ kind: "UnaryExpr", op, postfix: true, operand: target, lexeme }, [target])
		}

		return target
	}
}

export function parse(lexemes: readonly Lexeme[], options?: ParseOptions): Program {
	const parser = new Parser(lexemes, options)
	return parser.parse()
}
