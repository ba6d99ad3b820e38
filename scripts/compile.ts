#!/usr/bin/env node
/**
 * Run a source file through the front end: lex → parse → analyze, then
 * write the declaration and type reports.
 *
 * Usage:
 *   tsx scripts/compile.ts <file.c> [--decl-out path] [--type-out path] [--max-depth n] [--verbose]
 *
 * Reports go to stdout unless an output path is given. Exits 1 on the first
 * error of any kind.
 */
import { readFileSync, writeFileSync } from "node:fs"
import { parseArgs } from "node:util"
import {
	compile,
	createTraceLog,
	declarationReport,
	formatDiagnostic,
	formatTraceMessage,
	typeReport,
} from "../src/compiler"

const { values, positionals } = parseArgs({
	allowPositionals: true,
	options: {
		"decl-out": { type: "string" },
		"type-out": { type: "string" },
		"max-depth": { type: "string" },
		verbose: { type: "boolean", short: "v", default: false },
	},
})

const filePath = positionals[0]
if (!filePath) {
	console.error("usage: compile <file> [--decl-out path] [--type-out path] [--max-depth n] [--verbose]")
	process.exit(1)
}

const maxDepth = values["max-depth"] === undefined ? undefined : Number.parseInt(values["max-depth"], 10)
if (maxDepth !== undefined && !(maxDepth > 0)) {
	console.error(`--max-depth must be a positive integer, got '${values["max-depth"]}'`)
	process.exit(1)
}

let source: string
try {
	source = readFileSync(filePath, "utf-8")
} catch (err) {
	console.error(`Couldn't open file for input: ${filePath}\n\t${err instanceof Error ? err.message : String(err)}`)
	process.exit(1)
}

const log = values.verbose ? createTraceLog() : undefined
const result = compile(source, { file: filePath, maxDepth, log })

if (log) {
	for (const m of log.getMessages()) {
		console.log(formatTraceMessage(m))
	}
}

if (!result.success || !result.program || !result.analysis) {
	if (result.diagnostic) console.error(formatDiagnostic(result.diagnostic))
	process.exit(1)
}

function emit(lines: string[], outPath: string | undefined): void {
	const text = lines.map((l) => `${l}\n`).join("")
	if (outPath === undefined) {
		process.stdout.write(text)
		return
	}
	try {
		writeFileSync(outPath, text)
	} catch (err) {
		console.error(`Couldn't open file for output: ${outPath}\n\t${err instanceof Error ? err.message : String(err)}`)
		process.exit(1)
	}
}

emit(declarationReport(result.program), values["decl-out"])
emit(typeReport(result.program, result.analysis), values["type-out"])
