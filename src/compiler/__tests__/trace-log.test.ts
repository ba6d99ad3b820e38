import { describe, expect, it } from "vitest"
import { compile } from "../compile"
import { createTraceLog, formatTraceMessage } from "../trace-log"

describe("createTraceLog", () => {
	it("starts with no messages", () => {
		const log = createTraceLog()
		expect(log.getMessages()).toHaveLength(0)
	})

	it("records messages in order", () => {
		const log = createTraceLog()
		log.phase("parse")
		log.declare("parameter", "n", 3)
		log.resolve("putint", "stdlib", 4)
		log.typeError("undeclared identifier 'y'", 5)

		expect(log.getMessages()).toEqual([
			{ type: "phase", phase: "parse" },
			{ type: "declare", kind: "parameter", name: "n", line: 3 },
			{ type: "resolve", callee: "putint", target: "stdlib", line: 4 },
			{ type: "type_error", message: "undeclared identifier 'y'", line: 5 },
		])
	})

	it("keeps logs independent", () => {
		const a = createTraceLog()
		const b = createTraceLog()
		a.phase("lex")
		expect(a.getMessages()).toHaveLength(1)
		expect(b.getMessages()).toHaveLength(0)
	})
})

describe("formatTraceMessage", () => {
	it("formats each message type", () => {
		expect(formatTraceMessage({ type: "phase", phase: "analyze" })).toBe("[analyze]")
		expect(formatTraceMessage({ type: "declare", kind: "global variable", name: "g", line: 1 })).toBe(
			"  line 1: declared global variable g",
		)
		expect(formatTraceMessage({ type: "resolve", callee: "sq", target: "user", line: 7 })).toBe(
			"  line 7: call sq -> user",
		)
		expect(formatTraceMessage({ type: "type_error", message: "bad", line: 2 })).toBe(
			"  line 2: type error: bad",
		)
	})
})

describe("tracing a compile", () => {
	it("records phases, declarations and call resolutions", () => {
		const log = createTraceLog()
		compile("int g;\nvoid f() { putint(g); }", { log })

		expect(log.getMessages()).toEqual([
			{ type: "phase", phase: "lex" },
			{ type: "phase", phase: "parse" },
			{ type: "declare", kind: "global variable", name: "g", line: 1 },
			{ type: "declare", kind: "function", name: "f", line: 2 },
			{ type: "phase", phase: "analyze" },
			{ type: "resolve", callee: "putint", target: "stdlib", line: 2 },
		])
	})

	it("records failed resolutions and type errors", () => {
		const log = createTraceLog()
		compile("void f() { g(1); }", { log })

		expect(log.getMessages().slice(-2)).toEqual([
			{ type: "resolve", callee: "g", target: "none", line: 1 },
			{ type: "type_error", message: "no matching function for call to 'g(int)'", line: 1 },
		])
	})

	it("stops at the phase that failed", () => {
		const log = createTraceLog()
		compile("int x", { log })
		expect(log.getMessages().map(formatTraceMessage)).toEqual([
			"[lex]",
			"[parse]",
			"  line 1: declared global variable x",
		])
	})
})
