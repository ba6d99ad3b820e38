import { describe, expect, it } from "vitest"
import { CompileError, type Diagnostic } from "../errors"
import { Lexer } from "../lexer"
import { TokenKind } from "../token"

function tokenKinds(source: string): TokenKind[] {
	return new Lexer(source)
		.tokenize()
		.filter((t) => t.kind !== TokenKind.EOF)
		.map((t) => t.kind)
}

function tokenTexts(source: string): string[] {
	return new Lexer(source)
		.tokenize()
		.filter((t) => t.kind !== TokenKind.EOF)
		.map((t) => t.text)
}

function lexError(source: string): Diagnostic {
	try {
		new Lexer(source, "test.c").tokenize()
	} catch (err) {
		if (err instanceof CompileError) return err.diagnostic
		throw err
	}
	throw new Error("expected a lexer error")
}

describe("Lexer", () => {
	it("tokenizes a function header", () => {
		expect(tokenKinds("int main() { return 0; }")).toEqual([
			TokenKind.Type,
			TokenKind.Ident,
			TokenKind.LParen,
			TokenKind.RParen,
			TokenKind.LBrace,
			TokenKind.Return,
			TokenKind.IntLit,
			TokenKind.Semicolon,
			TokenKind.RBrace,
		])
	})

	it("treats all four type names as TYPE lexemes", () => {
		expect(tokenKinds("int char float void")).toEqual([
			TokenKind.Type,
			TokenKind.Type,
			TokenKind.Type,
			TokenKind.Type,
		])
	})

	it("tokenizes keywords", () => {
		expect(tokenKinds("if else for while do break continue return")).toEqual([
			TokenKind.If,
			TokenKind.Else,
			TokenKind.For,
			TokenKind.While,
			TokenKind.Do,
			TokenKind.Break,
			TokenKind.Continue,
			TokenKind.Return,
		])
	})

	it("does not split identifiers that start with a keyword", () => {
		expect(tokenKinds("integer iffy _do2")).toEqual([TokenKind.Ident, TokenKind.Ident, TokenKind.Ident])
	})

	it("prefers two-character operators", () => {
		expect(tokenTexts("a += b++ && c != d")).toEqual(["a", "+=", "b", "++", "&&", "c", "!=", "d"])
		expect(tokenKinds("<= >= == || -- *= /= -=")).toEqual([
			TokenKind.LtEq,
			TokenKind.GtEq,
			TokenKind.Eq,
			TokenKind.PipePipe,
			TokenKind.Decr,
			TokenKind.StarAssign,
			TokenKind.SlashAssign,
			TokenKind.MinusAssign,
		])
	})

	it("tokenizes single-character operators", () => {
		expect(tokenKinds("& | ! ~ ? : %")).toEqual([
			TokenKind.Amp,
			TokenKind.Pipe,
			TokenKind.Bang,
			TokenKind.Tilde,
			TokenKind.Question,
			TokenKind.Colon,
			TokenKind.Percent,
		])
	})

	it("distinguishes integer and real literals", () => {
		expect(tokenKinds("42 3.14 1e5 2.5e-3")).toEqual([
			TokenKind.IntLit,
			TokenKind.RealLit,
			TokenKind.RealLit,
			TokenKind.RealLit,
		])
		expect(tokenTexts("42 3.14 1e5 2.5e-3")).toEqual(["42", "3.14", "1e5", "2.5e-3"])
	})

	it("keeps quotes and escapes in literal text", () => {
		const tokens = new Lexer(`'a' '\\n' "say \\"hi\\""`).tokenize()
		expect(tokens.map((t) => t.kind)).toEqual([
			TokenKind.CharLit,
			TokenKind.CharLit,
			TokenKind.StrLit,
			TokenKind.EOF,
		])
		expect(tokens.map((t) => t.text)).toEqual(["'a'", "'\\n'", '"say \\"hi\\""', ""])
	})

	it("skips comments", () => {
		expect(tokenTexts("a // line comment\nb /* block\ncomment */ c")).toEqual(["a", "b", "c"])
	})

	it("counts lines through whitespace and comments", () => {
		const tokens = new Lexer("int a;\n\n/* one\ntwo */ b\n// c\nd").tokenize()
		expect(tokens.map((t) => [t.text, t.line])).toEqual([
			["int", 1],
			["a", 1],
			[";", 1],
			["b", 4],
			["d", 6],
			["", 6],
		])
	})

	it("stamps every lexeme with the file name", () => {
		const tokens = new Lexer("x y", "prog.c").tokenize()
		expect(tokens.map((t) => t.file)).toEqual(["prog.c", "prog.c", "prog.c"])
	})

	it("defaults the file name", () => {
		const tokens = new Lexer("").tokenize()
		expect(tokens).toEqual([{ kind: TokenKind.EOF, text: "", file: "<input>", line: 1 }])
	})

	describe("errors", () => {
		it("rejects an unexpected character", () => {
			expect(lexError("int a;\nint @b;")).toEqual({
				phase: "lex",
				message: "unexpected character",
				file: "test.c",
				line: 2,
				text: "@",
			})
		})

		it("rejects an unterminated string", () => {
			const d = lexError('putstring("abc')
			expect(d.message).toBe("unterminated literal")
			expect(d.text).toBe('"abc')
		})

		it("rejects a string broken across lines", () => {
			const d = lexError('"ab\ncd"')
			expect(d.message).toBe("unterminated literal")
			expect(d.line).toBe(1)
		})

		it("rejects an unknown escape", () => {
			const d = lexError("'\\q'")
			expect(d.message).toBe("unknown escape sequence")
			expect(d.text).toBe("'\\q")
		})

		it("rejects a character literal with more than one character", () => {
			const d = lexError("'ab'")
			expect(d.message).toBe("character literal must hold exactly one character")
			expect(d.text).toBe("'ab'")
		})

		it("rejects an empty character literal", () => {
			expect(lexError("''").message).toBe("character literal must hold exactly one character")
		})

		it("reports an unterminated comment at its opening line", () => {
			expect(lexError("a\n/* never\nclosed")).toEqual({
				phase: "lex",
				message: "unterminated comment",
				file: "test.c",
				line: 2,
				text: "/*",
			})
		})
	})
})
