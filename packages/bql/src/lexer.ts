// packages/bql/src/lexer.ts
import type { Token, TokenType } from "./token.js";
import { lookupIdent } from "./token.js";

// signed integer with an optional relative-time unit (days, hours, months)
const NUMBER_RE = /^[+-]?\d+[dhmDHM]?$/;

const isDigit = (ch: string) => ch >= "0" && ch <= "9";
const isSpace = (ch: string) => ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
const isLetter = (ch: string) => /^\p{L}$/u.test(ch);
const isIdentChar = (ch: string) => ch === "_" || ch === "-" || isDigit(ch) || isLetter(ch);

const ESCAPES: Readonly<Record<string, string>> = { n: "\n", t: "\t", r: "\r" };

/**
 * Converts BQL text into tokens, one call at a time.
 * Never throws: characters it cannot classify come back as ILLEGAL tokens.
 */
export class Lexer {
  private i = 0;

  constructor(private readonly input: string) {}

  nextToken(): Token {
    this.skipWhitespace();

    const start = this.i;
    if (start >= this.input.length) return { type: "EOF", literal: "", pos: start + 1 };

    const ch = this.input.charAt(start);
    const next = this.input.charAt(start + 1);

    switch (ch) {
      case "(":
        return this.emit("LPAREN", 1);
      case ")":
        return this.emit("RPAREN", 1);
      case ",":
        return this.emit("COMMA", 1);
      case "*":
        return this.emit("STAR", 1);
      case "=":
        return this.emit("EQ", 1);
      case "~":
        return this.emit("CONTAINS", 1);
      case "!":
        if (next === "=") return this.emit("NEQ", 2);
        if (next === "~") return this.emit("NOT_CONTAINS", 2);
        return this.emit("ILLEGAL", 1);
      case "<":
        return next === "=" ? this.emit("LTE", 2) : this.emit("LT", 1);
      case ">":
        return next === "=" ? this.emit("GTE", 2) : this.emit("GT", 1);
      case '"':
      case "'":
        return this.readString(ch);
    }

    if (isDigit(ch) || ((ch === "-" || ch === "+") && isDigit(next))) return this.readNumber();
    if (isLetter(ch) || ch === "_") return this.readIdent();

    return this.emit("ILLEGAL", 1);
  }

  private emit(type: TokenType, width: number): Token {
    const start = this.i;
    this.i += width;
    return { type, literal: this.input.slice(start, this.i), pos: start + 1 };
  }

  private skipWhitespace() {
    while (this.i < this.input.length && isSpace(this.input.charAt(this.i))) this.i++;
  }

  private readIdentRun(from: number): string {
    this.i = from;
    while (this.i < this.input.length && isIdentChar(this.input.charAt(this.i))) this.i++;
    return this.input.slice(from, this.i);
  }

  private readIdent(): Token {
    const start = this.i;
    const literal = this.readIdentRun(start);
    return { type: lookupIdent(literal), literal, pos: start + 1 };
  }

  // "-7d", "42", "+3m" are numbers; "2024-01-15" or "123-abc" are identifiers.
  private readNumber(): Token {
    const start = this.i;
    const signed = !isDigit(this.input.charAt(start));
    this.readIdentRun(signed ? start + 1 : start);
    const literal = this.input.slice(start, this.i);

    if (NUMBER_RE.test(literal)) return { type: "NUMBER", literal, pos: start + 1 };
    return { type: signed ? "ILLEGAL" : "IDENT", literal, pos: start + 1 };
  }

  // Unterminated strings run to end of input.
  private readString(quote: string): Token {
    const start = this.i;
    this.i++; // opening quote

    let out = "";
    while (this.i < this.input.length) {
      const ch = this.input.charAt(this.i);
      if (ch === quote) {
        this.i++;
        break;
      }
      if (ch === "\\" && this.i + 1 < this.input.length) {
        const esc = this.input.charAt(this.i + 1);
        out += ESCAPES[esc] ?? esc;
        this.i += 2;
        continue;
      }
      out += ch;
      this.i++;
    }

    return { type: "STRING", literal: out, pos: start + 1 };
  }
}

/** Full token stream, EOF included. */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  const out: Token[] = [];
  for (;;) {
    const tok = lexer.nextToken();
    out.push(tok);
    if (tok.type === "EOF") return out;
  }
}
