// Semantic types for the language, used by the parser's declarations and the analyzer.

export type BaseType = "int" | "char" | "float" | "void"

export type DerivedType = BaseType | "error"

/** A derived type together with its array flag. */
export interface TypeInfo {
	readonly type: DerivedType
	readonly isArray: boolean
}

export const INT: TypeInfo = { type: "int", isArray: false }
export const CHAR: TypeInfo = { type: "char", isArray: false }
export const FLOAT: TypeInfo = { type: "float", isArray: false }
export const VOID: TypeInfo = { type: "void", isArray: false }
export const ERROR: TypeInfo = { type: "error", isArray: false }
export const CHAR_ARRAY: TypeInfo = { type: "char", isArray: true }

const BASE_TYPES: Record<string, BaseType> = {
	int: "int",
	char: "char",
	float: "float",
	void: "void",
}

/**
 * Map the text of a TYPE lexeme to its base type. Unknown text means the
 * lexeme source and this table disagree, which is not a user error.
 */
export function baseTypeOf(text: string): BaseType {
	const base = Object.hasOwn(BASE_TYPES, text) ? BASE_TYPES[text] : undefined
	if (base === undefined) {
		throw new Error(`internal error: unknown base type '${text}'`)
	}
	return base
}

export function typeEq(a: TypeInfo, b: TypeInfo): boolean {
	return a.type === b.type && a.isArray === b.isArray
}

export function isError(t: TypeInfo): boolean {
	return t.type === "error"
}

/** Int, char or float, not an array. */
export function isNumericScalar(t: TypeInfo): boolean {
	return !t.isArray && (t.type === "int" || t.type === "char" || t.type === "float")
}

export function isIntScalar(t: TypeInfo): boolean {
	return !t.isArray && t.type === "int"
}

export function typeToString(t: TypeInfo): string {
	return t.isArray ? `${t.type}[]` : t.type
}
