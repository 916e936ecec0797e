// src/core/lexer/token.ts
// Token kinds, keyword table and the Token record produced by the lexer

export const KEYWORD_KINDS = [
  "FUNC", "RETURN",
  "I8", "I16", "I32", "I64", "U8", "U16", "U32", "U64", "F32", "F64",
  "BOOL", "STRING", "CHAR", "VOID",
  "IF", "ELSE", "WHILE", "FOR", "STRUCT", "IMPORT", "CONST", "VAR",
  "TRUE", "FALSE",
] as const;

export const LITERAL_KINDS = [
  "IDENTIFIER", "INT_LITERAL", "FLOAT_LITERAL", "STRING_LITERAL", "CHAR_LITERAL",
] as const;

export const OPERATOR_KINDS = [
  "PLUS", "MINUS", "STAR", "SLASH", "PERCENT",
  "EQUAL", "EQUAL_EQUAL", "BANG", "BANG_EQUAL",
  "LESS", "LESS_EQUAL", "GREATER", "GREATER_EQUAL",
  "AMPERSAND", "AMPERSAND_AMP", "PIPE", "PIPE_PIPE",
  "ARROW", "PLUS_PLUS", "PLUS_EQUAL", "QUESTION",
] as const;

export const PUNCTUATOR_KINDS = [
  "LEFT_PAREN", "RIGHT_PAREN", "LEFT_BRACE", "RIGHT_BRACE",
  "LEFT_BRACKET", "RIGHT_BRACKET", "COMMA", "SEMICOLON", "COLON", "DOT",
] as const;

export type KeywordKind = (typeof KEYWORD_KINDS)[number];
export type LiteralTokenKind = (typeof LITERAL_KINDS)[number];
export type OperatorKind = (typeof OPERATOR_KINDS)[number];
export type PunctuatorKind = (typeof PUNCTUATOR_KINDS)[number];

export type TokenKind =
  | KeywordKind
  | LiteralTokenKind
  | OperatorKind
  | PunctuatorKind
  | "END_OF_FILE"
  | "ERROR";

/** Built-in type names; these are keywords, never identifiers. */
export const TYPE_KINDS = [
  "I8", "I16", "I32", "I64", "U8", "U16", "U32", "U64", "F32", "F64",
  "BOOL", "STRING", "CHAR", "VOID",
] as const satisfies readonly KeywordKind[];

export type TypeKind = (typeof TYPE_KINDS)[number];

export const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<string, KeywordKind>([
  ["func", "FUNC"],
  ["return", "RETURN"],
  ["i8", "I8"],
  ["i16", "I16"],
  ["i32", "I32"],
  ["i64", "I64"],
  ["u8", "U8"],
  ["u16", "U16"],
  ["u32", "U32"],
  ["u64", "U64"],
  ["f32", "F32"],
  ["f64", "F64"],
  ["bool", "BOOL"],
  ["string", "STRING"],
  ["char", "CHAR"],
  ["void", "VOID"],
  ["if", "IF"],
  ["else", "ELSE"],
  ["while", "WHILE"],
  ["for", "FOR"],
  ["struct", "STRUCT"],
  ["import", "IMPORT"],
  ["const", "CONST"],
  ["var", "VAR"],
  ["true", "TRUE"],
  ["false", "FALSE"],
]);

export interface Token {
  readonly kind: TokenKind;
  /** Source text of the token, or the error message for ERROR tokens. */
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
}

export function makeToken(kind: TokenKind, lexeme: string, line: number, column: number): Token {
  return { kind, lexeme, line, column };
}

export function isTypeKind(kind: TokenKind): kind is TypeKind {
  return TYPE_KINDS.some((k) => k === kind);
}

/** `[  1:  5] IDENTIFIER           'count'` */
export function formatToken(token: Token): string {
  const line = String(token.line).padStart(3, " ");
  const col = String(token.column).padStart(3, " ");
  return `[${line}:${col}] ${token.kind.padEnd(20, " ")} '${token.lexeme}'`;
}
