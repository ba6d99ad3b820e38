import { type Lexeme, TokenKind } from "./token"

/**
 * Forward-only view over a lexeme list. The final lexeme is expected to be
 * EOF; once reached, the cursor stays on it.
 */
export class LexemeCursor {
	private lexemes: readonly Lexeme[]
	private pos = 0
	private end: Lexeme

	constructor(lexemes: readonly Lexeme[]) {
		this.lexemes = lexemes
		const last = lexemes[lexemes.length - 1]
		this.end =
			last?.kind === TokenKind.EOF
				? last
				: { kind: TokenKind.EOF, text: "", file: last?.file ?? "<input>", line: last?.line ?? 1 }
	}

	peek(): Lexeme {
		return this.lexemes[this.pos] ?? this.end
	}

	advance(): Lexeme {
		const lexeme = this.peek()
		if (this.pos < this.lexemes.length) {
			this.pos++
		}
		return lexeme
	}

	check(kind: TokenKind): boolean {
		return this.peek().kind === kind
	}

	isAtEnd(): boolean {
		return this.check(TokenKind.EOF)
	}
}
