// src/core/codegen/literals.ts
// Literal lexemes to numeric values

/** Accepts decimal, 0x hex and 0b binary lexemes; underscores are separators. */
export function parseIntLiteral(lexeme: string): bigint {
  const text = lexeme.replace(/_/g, "");
  const prefix = text.slice(0, 2).toLowerCase();
  if (prefix === "0x" || prefix === "0b") {
    const digits = text.slice(2);
    return digits === "" ? 0n : BigInt(`${prefix}${digits}`);
  }
  return text === "" ? 0n : BigInt(text);
}

/** A dangling exponent such as `1e` reads as the mantissa alone. */
export function parseFloatLiteral(lexeme: string): number {
  const value = parseFloat(lexeme.replace(/_/g, ""));
  return Number.isNaN(value) ? 0 : value;
}

const ESCAPES: Record<string, number> = {
  n: 10,
  t: 9,
  r: 13,
  "0": 0,
  "\\": 92,
  "'": 39,
  '"': 34,
};

/** Code point of a quoted character literal such as `'a'` or `'\n'`. */
export function charLiteralCode(lexeme: string): number {
  const inner = lexeme.slice(1, -1);
  if (inner.startsWith("\\")) {
    const escaped = inner.slice(1);
    return ESCAPES[escaped] ?? escaped.codePointAt(0) ?? 0;
  }
  return inner.codePointAt(0) ?? 0;
}
