// src/core/lexer/lexer.ts
// On-demand scanner: source text in, one Token per scanToken() call

import { KEYWORDS, makeToken, type Token, type TokenKind } from "./token";

type Radix = 2 | 10 | 16;

export class Lexer {
  private start = 0;
  private current = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  /**
   * Returns the next token. Lexical problems come back as ERROR tokens whose
   * lexeme is the message; nothing is thrown. END_OF_FILE repeats forever.
   */
  scanToken(): Token {
    this.skipWhitespace();
    this.start = this.current;

    if (this.isAtEnd()) {
      return makeToken("END_OF_FILE", "", this.line, this.column);
    }

    const c = this.advance();

    if (isAlpha(c)) return this.identifier();
    if (isDigit(c)) return this.number();

    switch (c) {
      case "(": return this.token("LEFT_PAREN");
      case ")": return this.token("RIGHT_PAREN");
      case "{": return this.token("LEFT_BRACE");
      case "}": return this.token("RIGHT_BRACE");
      case "[": return this.token("LEFT_BRACKET");
      case "]": return this.token("RIGHT_BRACKET");
      case ",": return this.token("COMMA");
      case ";": return this.token("SEMICOLON");
      case ":": return this.token("COLON");
      case ".": return this.token("DOT");
      case "?": return this.token("QUESTION");
      case "*": return this.token("STAR");
      case "/": return this.token("SLASH");
      case "%": return this.token("PERCENT");
      case "+":
        if (this.match("+")) return this.token("PLUS_PLUS");
        if (this.match("=")) return this.token("PLUS_EQUAL");
        return this.token("PLUS");
      case "-":
        return this.token(this.match(">") ? "ARROW" : "MINUS");
      case "!":
        return this.token(this.match("=") ? "BANG_EQUAL" : "BANG");
      case "=":
        return this.token(this.match("=") ? "EQUAL_EQUAL" : "EQUAL");
      case "<":
        return this.token(this.match("=") ? "LESS_EQUAL" : "LESS");
      case ">":
        return this.token(this.match("=") ? "GREATER_EQUAL" : "GREATER");
      case "&":
        return this.token(this.match("&") ? "AMPERSAND_AMP" : "AMPERSAND");
      case "|":
        return this.token(this.match("|") ? "PIPE_PIPE" : "PIPE");
      case '"':
        return this.string();
      case "'":
        return this.char();
    }

    return this.errorToken(`Unexpected character: ${c}`);
  }

  // ─────────────────────────────────────────────────────────────
  // Scanners
  // ─────────────────────────────────────────────────────────────

  private identifier(): Token {
    while (isAlpha(this.peek()) || isDigit(this.peek())) this.advance();
    const text = this.source.slice(this.start, this.current);
    return this.token(KEYWORDS.get(text) ?? "IDENTIFIER");
  }

  private number(): Token {
    let radix: Radix = 10;
    let isFloat = false;

    // Prefixes only count right after a lone leading zero.
    if (this.source[this.start] === "0" && this.current - this.start === 1) {
      if (this.peek() === "x") {
        radix = 16;
        this.advance();
      } else if (this.peek() === "b") {
        radix = 2;
        this.advance();
      }
    }

    for (;;) {
      const c = this.peek();
      if (c === ".") {
        if (isFloat || radix !== 10) return this.errorToken("Invalid numeric format");
        isFloat = true;
        this.advance();
      } else if (c === "_" || isDigitIn(radix, c)) {
        this.advance();
      } else {
        break;
      }
    }

    if (radix === 10 && (this.peek() === "e" || this.peek() === "E")) {
      isFloat = true;
      this.advance();
      if (this.peek() === "+" || this.peek() === "-") this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    return this.token(isFloat ? "FLOAT_LITERAL" : "INT_LITERAL");
  }

  private string(): Token {
    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === "\\") {
        this.advance();
        if (this.isAtEnd()) break;
      }
      this.advance();
    }

    if (this.isAtEnd()) return this.errorToken("Unterminated string");

    this.advance();
    return this.token("STRING_LITERAL");
  }

  private char(): Token {
    if (this.isAtEnd()) return this.errorToken("Unterminated character");

    if (this.peek() === "'") {
      this.advance();
      return this.errorToken("Empty character literal");
    }

    if (this.peek() === "\\") {
      this.advance();
      if (this.isAtEnd()) return this.errorToken("Unterminated character after escape");
    }
    this.advance();

    if (this.isAtEnd()) return this.errorToken("Unterminated character");

    if (this.peek() !== "'") {
      // Skip the rest of the literal so scanning resumes after it.
      while (!this.isAtEnd() && this.peek() !== "'" && this.peek() !== "\n") this.advance();
      if (this.peek() === "'") this.advance();
      return this.errorToken("Character too long");
    }

    this.advance();
    return this.token("CHAR_LITERAL");
  }

  private skipWhitespace(): void {
    for (;;) {
      const c = this.peek();
      if (c === " " || c === "\t" || c === "\r" || c === "\n") {
        this.advance();
      } else if (c === "/" && this.peekNext() === "/") {
        while (!this.isAtEnd() && this.peek() !== "\n") this.advance();
      } else if (c === "/" && this.peekNext() === "*") {
        this.advance();
        this.advance();
        while (!this.isAtEnd() && !(this.peek() === "*" && this.peekNext() === "/")) this.advance();
        if (!this.isAtEnd()) {
          this.advance();
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Cursor
  // ─────────────────────────────────────────────────────────────

  private advance(): string {
    const c = this.source.charAt(this.current++);
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.source.charAt(this.current) !== expected) return false;
    this.advance();
    return true;
  }

  private peek(): string {
    return this.source.charAt(this.current);
  }

  private peekNext(): string {
    return this.source.charAt(this.current + 1);
  }

  private token(kind: TokenKind): Token {
    const lexeme = this.source.slice(this.start, this.current);
    return makeToken(kind, lexeme, this.line, Math.max(1, this.column - lexeme.length));
  }

  private errorToken(message: string): Token {
    return makeToken("ERROR", message, this.line, this.column);
  }
}

/** Scans the whole source, END_OF_FILE included. */
export function tokenize(source: string, limit = Infinity): Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.scanToken();
    tokens.push(token);
    if (token.kind === "END_OF_FILE" || tokens.length >= limit) return tokens;
  }
}

function isAlpha(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_" || c.charCodeAt(0) > 0x7f;
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isDigitIn(radix: Radix, c: string): boolean {
  switch (radix) {
    case 2: return c === "0" || c === "1";
    case 10: return isDigit(c);
    case 16: return isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");
  }
}
