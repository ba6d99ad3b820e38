export enum TokenKind {
	// Literals
	IntLit = "IntLit",
	CharLit = "CharLit",
	RealLit = "RealLit",
	StrLit = "StrLit",

	// Identifiers
	Ident = "Ident",

	// Keywords
	Type = "Type",
	If = "If",
	Else = "Else",
	For = "For",
	While = "While",
	Do = "Do",
	Break = "Break",
	Continue = "Continue",
	Return = "Return",

	// Operators
	Plus = "Plus",
	Minus = "Minus",
	Star = "Star",
	Slash = "Slash",
	Percent = "Percent",
	Amp = "Amp",
	Pipe = "Pipe",
	AmpAmp = "AmpAmp",
	PipePipe = "PipePipe",
	Eq = "Eq",
	NotEq = "NotEq",
	Lt = "Lt",
	LtEq = "LtEq",
	Gt = "Gt",
	GtEq = "GtEq",
	Bang = "Bang",
	Tilde = "Tilde",
	Assign = "Assign",
	StarAssign = "StarAssign",
	SlashAssign = "SlashAssign",
	PlusAssign = "PlusAssign",
	MinusAssign = "MinusAssign",
	Incr = "Incr",
	Decr = "Decr",

	// Delimiters
	LParen = "LParen",
	RParen = "RParen",
	LBrace = "LBrace",
	RBrace = "RBrace",
	LBracket = "LBracket",
	RBracket = "RBracket",
	Comma = "Comma",
	Semicolon = "Semicolon",
	Colon = "Colon",
	Question = "Question",

	// Special
	EOF = "EOF",
}

/** One token of the input, as produced by the lexer. */
export interface Lexeme {
	readonly kind: TokenKind
	readonly text: string
	readonly file: string
	readonly line: number
}

const KEYWORDS: Record<string, TokenKind> = {
	int: TokenKind.Type,
	char: TokenKind.Type,
	float: TokenKind.Type,
	void: TokenKind.Type,
	if: TokenKind.If,
	else: TokenKind.Else,
	for: TokenKind.For,
	while: TokenKind.While,
	do: TokenKind.Do,
	break: TokenKind.Break,
	continue: TokenKind.Continue,
	return: TokenKind.Return,
}

export function keywordKind(word: string): TokenKind | undefined {
	return Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined
}
