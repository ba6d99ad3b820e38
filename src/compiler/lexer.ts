import { CompileError } from "./errors"
import { type Lexeme, TokenKind, keywordKind } from "./token"

export class Lexer {
	private source: string
	private file: string
	private pos = 0
	private line = 1
	private lexemes: Lexeme[] = []

	constructor(source: string, file = "<input>") {
		this.source = source
		this.file = file
	}

	/** Lex the whole source. Throws a CompileError on the first bad character. */
	tokenize(): Lexeme[] {
		while (this.pos < this.source.length) {
			this.skipWhitespaceAndComments()
			if (this.pos >= this.source.length) break

			const ch = this.peek()

			if (isDigit(ch)) {
				this.readNumber()
				continue
			}

			if (ch === '"') {
				this.readQuoted('"', TokenKind.StrLit)
				continue
			}

			if (ch === "'") {
				this.readQuoted("'", TokenKind.CharLit)
				continue
			}

			if (isIdentStart(ch)) {
				this.readIdentOrKeyword()
				continue
			}

			this.readOperatorOrDelimiter()
		}

		this.emit(TokenKind.EOF, "", this.line)
		return this.lexemes
	}

	private peek(): string {
		return this.pos < this.source.length ? this.source.charAt(this.pos) : "\0"
	}

	private peekNext(): string {
		return this.pos + 1 < this.source.length ? this.source.charAt(this.pos + 1) : "\0"
	}

	private advance(): string {
		const ch = this.source.charAt(this.pos)
		this.pos++
		if (ch === "\n") this.line++
		return ch
	}

	private emit(kind: TokenKind, text: string, line: number): void {
		this.lexemes.push({ kind, text, file: this.file, line })
	}

	private fail(text: string, message: string, line = this.line): never {
		throw CompileError.at("lex", { kind: TokenKind.EOF, text, file: this.file, line }, message)
	}

	private skipWhitespaceAndComments(): void {
		while (this.pos < this.source.length) {
			const ch = this.peek()

			if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
				this.advance()
				continue
			}

			// Line comment
			if (ch === "/" && this.peekNext() === "/") {
				while (this.pos < this.source.length && this.peek() !== "\n") {
					this.advance()
				}
				continue
			}

			// Block comment
			if (ch === "/" && this.peekNext() === "*") {
				const startLine = this.line
				this.advance()
				this.advance()
				while (!(this.peek() === "*" && this.peekNext() === "/")) {
					if (this.pos >= this.source.length) {
						this.fail("/*", "unterminated comment", startLine)
					}
					this.advance()
				}
				this.advance()
				this.advance()
				continue
			}

			break
		}
	}

	private readNumber(): void {
		const start = this.pos
		let isReal = false

		while (isDigit(this.peek())) this.advance()

		if (this.peek() === "." && isDigit(this.peekNext())) {
			isReal = true
			this.advance() // consume '.'
			while (isDigit(this.peek())) this.advance()
		}

		if (this.peek() === "e" || this.peek() === "E") {
			const next = this.peekNext()
			const signed = next === "+" || next === "-"
			const digitAt = signed ? this.source.charAt(this.pos + 2) : next
			if (isDigit(digitAt)) {
				isReal = true
				this.advance()
				if (signed) this.advance()
				while (isDigit(this.peek())) this.advance()
			}
		}

		this.emit(isReal ? TokenKind.RealLit : TokenKind.IntLit, this.source.slice(start, this.pos), this.line)
	}

	private readQuoted(quote: string, kind: TokenKind): void {
		const start = this.pos
		const line = this.line
		this.advance() // opening quote
		let length = 0

		while (this.peek() !== quote) {
			if (this.pos >= this.source.length || this.peek() === "\n") {
				this.fail(this.source.slice(start, this.pos), "unterminated literal", line)
			}
			if (this.peek() === "\\") {
				this.advance()
				if (!ESCAPES.has(this.peek())) {
					this.fail(this.source.slice(start, this.pos + 1), "unknown escape sequence", line)
				}
			}
			this.advance()
			length++
		}
		this.advance() // closing quote

		const text = this.source.slice(start, this.pos)
		if (kind === TokenKind.CharLit && length !== 1) {
			this.fail(text, "character literal must hold exactly one character", line)
		}
		this.emit(kind, text, line)
	}

	private readIdentOrKeyword(): void {
		const start = this.pos
		while (isIdentPart(this.peek())) this.advance()

		const text = this.source.slice(start, this.pos)
		this.emit(keywordKind(text) ?? TokenKind.Ident, text, this.line)
	}

	private readOperatorOrDelimiter(): void {
		const ch = this.peek()
		const two = ch + this.peekNext()

		// Two-character operators
		const twoCharOp = Object.hasOwn(TWO_CHAR_OPS, two) ? TWO_CHAR_OPS[two] : undefined
		if (twoCharOp !== undefined) {
			this.advance()
			this.advance()
			this.emit(twoCharOp, two, this.line)
			return
		}

		// Single-character operators/delimiters
		const oneCharOp = Object.hasOwn(ONE_CHAR_OPS, ch) ? ONE_CHAR_OPS[ch] : undefined
		if (oneCharOp !== undefined) {
			this.advance()
			this.emit(oneCharOp, ch, this.line)
			return
		}

		this.fail(ch, "unexpected character")
	}
}

const ESCAPES = new Set(["n", "t", "\\", "'", '"', "0"])

const TWO_CHAR_OPS: Record<string, TokenKind> = {
	"&&": TokenKind.AmpAmp,
	"||": TokenKind.PipePipe,
	"==": TokenKind.Eq,
	"!=": TokenKind.NotEq,
	"<=": TokenKind.LtEq,
	">=": TokenKind.GtEq,
	"*=": TokenKind.StarAssign,
	"/=": TokenKind.SlashAssign,
	"+=": TokenKind.PlusAssign,
	"-=": TokenKind.MinusAssign,
	"++": TokenKind.Incr,
	"--": TokenKind.Decr,
}

const ONE_CHAR_OPS: Record<string, TokenKind> = {
	"+": TokenKind.Plus,
	"-": TokenKind.Minus,
	"*": TokenKind.Star,
	"/": TokenKind.Slash,
	"%": TokenKind.Percent,
	"&": TokenKind.Amp,
	"|": TokenKind.Pipe,
	"<": TokenKind.Lt,
	">": TokenKind.Gt,
	"!": TokenKind.Bang,
	"~": TokenKind.Tilde,
	"=": TokenKind.Assign,
	"(": TokenKind.LParen,
	")": TokenKind.RParen,
	"{": TokenKind.LBrace,
	"}": TokenKind.RBrace,
	"[": TokenKind.LBracket,
	"]": TokenKind.RBracket,
	",": TokenKind.Comma,
	";": TokenKind.Semicolon,
	":": TokenKind.Colon,
	"?": TokenKind.Question,
}

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9"
}

function isIdentStart(ch: string): boolean {
	return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_"
}

function isIdentPart(ch: string): boolean {
	return isIdentStart(ch) || isDigit(ch)
}
