/**
 * Trace log collector for front-end runs.
 *
 * Records phase transitions, declarations, call resolutions and type errors
 * as the parser and analyzer run. Opt-in: both accept a log and skip
 * tracing when none is given.
 */

import type { DeclKind } from "./ast"

export type TraceMessageType = "phase" | "declare" | "resolve" | "type_error"

export type TracePhase = "lex" | "parse" | "analyze"

export interface PhaseMessage {
	readonly type: "phase"
	readonly phase: TracePhase
}

export interface DeclareMessage {
	readonly type: "declare"
	readonly kind: DeclKind
	readonly name: string
	readonly line: number
}

export interface ResolveMessage {
	readonly type: "resolve"
	readonly callee: string
	readonly target: "user" | "stdlib" | "none"
	readonly line: number
}

export interface TypeErrorMessage {
	readonly type: "type_error"
	readonly message: string
	readonly line: number
}

export type TraceMessage = PhaseMessage | DeclareMessage | ResolveMessage | TypeErrorMessage

export interface TraceLog {
	phase(phase: TracePhase): void
	declare(kind: DeclKind, name: string, line: number): void
	resolve(callee: string, target: ResolveMessage["target"], line: number): void
	typeError(message: string, line: number): void
	getMessages(): readonly TraceMessage[]
}

/** Create a new, empty trace log. */
export function createTraceLog(): TraceLog {
	const messages: TraceMessage[] = []

	return {
		phase(phase: TracePhase) {
			messages.push({ type: "phase", phase })
		},

		declare(kind: DeclKind, name: string, line: number) {
			messages.push({ type: "declare", kind, name, line })
		},

		resolve(callee: string, target: ResolveMessage["target"], line: number) {
			messages.push({ type: "resolve", callee, target, line })
		},

		typeError(message: string, line: number) {
			messages.push({ type: "type_error", message, line })
		},

		getMessages(): readonly TraceMessage[] {
			return messages
		},
	}
}

export function formatTraceMessage(m: TraceMessage): string {
	switch (m.type) {
		case "phase":
			return `[${m.phase}]`
		case "declare":
			return `  line ${m.line}: declared ${m.kind} ${m.name}`
		case "resolve":
			return `  line ${m.line}: call ${m.callee} -> ${m.target}`
		case "type_error":
			return `  line ${m.line}: type error: ${m.message}`
	}
}
