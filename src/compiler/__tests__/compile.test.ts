import { describe, expect, it } from "vitest"
import { compile } from "../compile"
import { formatDiagnostic } from "../errors"

describe("compile", () => {
	it("succeeds on a valid program", () => {
		const result = compile("int main() { putint(getint() * 2); return 0; }")
		expect(result.success).toBe(true)
		expect(result.diagnostic).toBeUndefined()
		expect(result.program?.funcs.map((f) => f.name)).toEqual(["main"])
		expect(result.analysis?.errors.hasErrors()).toBe(false)
	})

	it("reports a lexer error", () => {
		const result = compile("int x;\nint @;", { file: "prog.c" })
		expect(result.success).toBe(false)
		expect(result.program).toBeUndefined()
		expect(result.diagnostic && formatDiagnostic(result.diagnostic)).toBe(
			"Lexer error in file prog.c line 2 at text @\n\tunexpected character",
		)
	})

	it("reports a syntax error", () => {
		const result = compile("int x")
		expect(result.success).toBe(false)
		expect(result.diagnostic).toEqual({
			phase: "syntax",
			message: "Expected ';'",
			file: "<input>",
			line: 1,
			text: "",
		})
		expect(result.diagnostic && formatDiagnostic(result.diagnostic)).toBe(
			"Parser error in file <input> line 1 at text \n\tExpected ';'",
		)
	})

	it("reports a declaration error", () => {
		const result = compile("int x;\nfloat x;", { file: "prog.c" })
		expect(result.diagnostic && formatDiagnostic(result.diagnostic)).toBe(
			"Type checking error in file prog.c line 2 at text x\n\tvariable redeclared",
		)
	})

	it("reports the first type error and keeps the analysis", () => {
		const result = compile("void f(float x) {\n  putint(x);\n  y;\n}", { file: "prog.c" })
		expect(result.success).toBe(false)
		expect(result.diagnostic && formatDiagnostic(result.diagnostic)).toBe(
			"Type checking error in file prog.c line 2 at text putint\n\tno matching function for call to 'putint(float)'",
		)
		expect(result.analysis?.errors.errors).toHaveLength(2)
		expect(result.program?.funcs).toHaveLength(1)
	})

	it("reports a type error before a declaration error in a later function", () => {
		const result = compile("void f() {\n  y;\n}\nvoid f() { }")
		expect(result.success).toBe(false)
		expect(result.diagnostic).toEqual({
			phase: "type",
			message: "undeclared identifier 'y'",
			file: "<input>",
			line: 2,
			text: "y",
		})
	})

	it("reports a declaration error that comes before any type error", () => {
		const result = compile("void f(int a, int a) {\n  y;\n}")
		expect(result.diagnostic).toMatchObject({ phase: "declaration", message: "parameter redeclared", line: 1 })
	})

	it("passes the nesting bound through to the parser", () => {
		const source = "void f() { ((((1)))); }"
		expect(compile(source).success).toBe(true)
		expect(compile(source, { maxDepth: 3 }).diagnostic?.message).toBe("expression too deeply nested")
	})
})
