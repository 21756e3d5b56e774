// packages/bql/src/parser.ts
//
// Recursive descent over a (current, peek) token window.
//
//   query      := [expression] [expand] [orderBy]
//   expression := term   ( OR term )*
//   term       := factor ( AND factor )*
//   factor     := NOT factor | '(' expression ')' | comparison
//   comparison := IDENT ( op value | [NOT] IN '(' value (',' value)* ')' )
//   expand     := EXPAND IDENT [ DEPTH (NUMBER | '*') ]
//   orderBy    := ORDER BY IDENT [ASC|DESC] (',' IDENT [ASC|DESC])*

import type { ExpandClause, ExpandDepth, ExpandDirection, Expr, OrderTerm, Query, Value } from "./ast.js";
import { DEPTH_DEFAULT, DEPTH_MAX, DEPTH_UNLIMITED } from "./ast.js";
import { BqlParseError } from "./errors.js";
import { Lexer } from "./lexer.js";
import type { Token, TokenType } from "./token.js";
import { comparisonOpOf } from "./token.js";

const PRIORITY_RE = /^[pP][0-4]$/;
const OFFSET_RE = /^([+-]?\d+)([dhmDHM])$/;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const EXPAND_WORDS: Readonly<Record<string, ExpandDirection>> = {
  up: "UP",
  upstream: "UP",
  blockers: "UP",
  parent: "UP",
  parents: "UP",
  down: "DOWN",
  downstream: "DOWN",
  children: "DOWN",
  blocks: "DOWN",
  all: "ALL",
  deps: "ALL",
};

const VALID_EXPAND_WORDS = Object.keys(EXPAND_WORDS).join(", ");

function describe(tok: Token): string {
  return tok.type === "EOF" ? "end of input" : JSON.stringify(tok.literal);
}

export class Parser {
  private lexer: Lexer;
  private current: Token;
  private peek: Token;

  constructor(input: string) {
    this.lexer = new Lexer(input);
    this.current = this.lexer.nextToken();
    this.peek = this.lexer.nextToken();
  }

  parse(): Query {
    const query: Query = { filter: null, expand: null, order_by: [] };

    const t = this.current.type;
    if (t !== "EXPAND" && t !== "ORDER" && t !== "EOF") {
      query.filter = this.parseExpression();
    }

    if (this.current.type === "EXPAND") query.expand = this.parseExpand();
    if (this.current.type === "ORDER") query.order_by = this.parseOrderBy();

    if (this.current.type !== "EOF") {
      if (this.current.type === "ILLEGAL") throw this.fail("end of query");
      throw new BqlParseError(
        `unexpected token ${describe(this.current)} at position ${this.current.pos}`,
        this.current.pos,
        this.current.literal
      );
    }

    return query;
  }

  // Reads the current token type through a call so TypeScript does not keep
  // a narrowing of `this.current.type` across `advance()`.
  private at(type: TokenType): boolean {
    return this.current.type === type;
  }

  private advance() {
    this.current = this.peek;
    this.peek = this.lexer.nextToken();
  }

  private fail(expected: string): BqlParseError {
    const tok = this.current;
    if (tok.type === "ILLEGAL") {
      return new BqlParseError(
        `illegal character ${describe(tok)} at position ${tok.pos}`,
        tok.pos,
        tok.literal
      );
    }
    return new BqlParseError(
      `expected ${expected} at position ${tok.pos}, got ${describe(tok)}`,
      tok.pos,
      tok.literal
    );
  }

  // -------------------------
  // Boolean structure
  // -------------------------
  private parseExpression(): Expr {
    let left = this.parseTerm();
    while (this.current.type === "OR") {
      this.advance();
      left = { kind: "binary", op: "OR", left, right: this.parseTerm() };
    }
    return left;
  }

  private parseTerm(): Expr {
    let left = this.parseFactor();
    while (this.current.type === "AND") {
      this.advance();
      left = { kind: "binary", op: "AND", left, right: this.parseFactor() };
    }
    return left;
  }

  private parseFactor(): Expr {
    if (this.current.type === "NOT") {
      this.advance();
      return { kind: "not", expr: this.parseFactor() };
    }

    if (this.current.type === "LPAREN") {
      this.advance();
      const expr = this.parseExpression();
      if (!this.at("RPAREN")) throw this.fail("')'");
      this.advance();
      return expr;
    }

    return this.parseComparison();
  }

  private parseComparison(): Expr {
    if (this.current.type !== "IDENT") throw this.fail("field name");
    const field = this.current.literal;
    this.advance();

    if (this.at("NOT") && this.peek.type === "IN") {
      this.advance();
      this.advance();
      return { kind: "in", field, values: this.parseValueList(), negated: true };
    }

    if (this.at("IN")) {
      this.advance();
      return { kind: "in", field, values: this.parseValueList(), negated: false };
    }

    const op = comparisonOpOf(this.current.type);
    if (!op) throw this.fail("operator");
    this.advance();

    return { kind: "compare", field, op, value: this.parseValue() };
  }

  private parseValueList(): Value[] {
    if (this.current.type !== "LPAREN") throw this.fail("'('");
    this.advance();

    const values: Value[] = [this.parseValue()];
    while (this.at("COMMA")) {
      this.advance();
      values.push(this.parseValue());
    }

    if (!this.at("RPAREN")) throw this.fail("')'");
    this.advance();
    return values;
  }

  // -------------------------
  // Values
  // -------------------------
  private parseValue(): Value {
    const tok = this.current;
    let v: Value;

    switch (tok.type) {
      case "STRING":
        v = ISO_DATE_RE.test(tok.literal)
          ? { kind: "date", raw: tok.literal, date: tok.literal }
          : { kind: "string", raw: tok.literal, text: tok.literal };
        break;
      case "NUMBER":
        v = numberValue(tok.literal);
        break;
      case "TRUE":
        v = { kind: "bool", raw: tok.literal, bool: true };
        break;
      case "FALSE":
        v = { kind: "bool", raw: tok.literal, bool: false };
        break;
      case "IDENT":
        v = identValue(tok.literal);
        break;
      default:
        throw this.fail("value");
    }

    this.advance();
    return v;
  }

  // -------------------------
  // Clauses
  // -------------------------
  private parseOrderBy(): OrderTerm[] {
    this.advance(); // ORDER
    if (this.current.type !== "BY") throw this.fail("'by'");
    this.advance();

    const terms: OrderTerm[] = [];
    for (;;) {
      if (!this.at("IDENT")) throw this.fail("field name");
      const term: OrderTerm = { field: this.current.literal, descending: false };
      this.advance();

      if (this.at("ASC")) {
        this.advance();
      } else if (this.at("DESC")) {
        term.descending = true;
        this.advance();
      }

      terms.push(term);
      if (!this.at("COMMA")) return terms;
      this.advance();
    }
  }

  private parseExpand(): ExpandClause {
    this.advance(); // EXPAND
    if (this.current.type !== "IDENT") {
      throw this.fail(`expansion type (valid: ${VALID_EXPAND_WORDS})`);
    }

    const word = this.current.literal;
    const direction = EXPAND_WORDS[word.toLowerCase()];
    if (!direction) {
      throw new BqlParseError(
        `unknown expansion type ${JSON.stringify(word)} at position ${this.current.pos} (valid: ${VALID_EXPAND_WORDS})`,
        this.current.pos,
        word
      );
    }
    this.advance();

    const clause: ExpandClause = { direction, depth: DEPTH_DEFAULT };
    if (this.at("DEPTH")) {
      this.advance();
      clause.depth = this.parseDepth();
    }
    return clause;
  }

  private parseDepth(): ExpandDepth {
    const tok = this.current;

    if (tok.type === "STAR") {
      this.advance();
      return DEPTH_UNLIMITED;
    }
    if (tok.type !== "NUMBER") throw this.fail("depth value (number or *)");

    if (!/^[+-]?\d+$/.test(tok.literal)) {
      throw new BqlParseError(`invalid depth value ${JSON.stringify(tok.literal)} at position ${tok.pos}`, tok.pos, tok.literal);
    }
    const n = Number.parseInt(tok.literal, 10);
    if (n < 1) {
      throw new BqlParseError(`depth must be at least 1, got ${n} at position ${tok.pos}`, tok.pos, tok.literal);
    }
    if (n > DEPTH_MAX) {
      throw new BqlParseError(`depth cannot exceed ${DEPTH_MAX}, got ${n} at position ${tok.pos}`, tok.pos, tok.literal);
    }

    this.advance();
    return n;
  }
}

function numberValue(literal: string): Value {
  const m = OFFSET_RE.exec(literal);
  if (m) return { kind: "date", raw: literal, date: `${m[1]}${m[2].toLowerCase()}` };
  return { kind: "int", raw: literal, int: Number.parseInt(literal, 10) };
}

function identValue(literal: string): Value {
  if (PRIORITY_RE.test(literal)) {
    const level = Number(literal.charAt(1));
    if (level === 0 || level === 1 || level === 2 || level === 3 || level === 4) {
      return { kind: "priority", raw: literal, level };
    }
  }

  const lower = literal.toLowerCase();
  if (lower === "today" || lower === "yesterday") return { kind: "date", raw: literal, date: lower };
  if (ISO_DATE_RE.test(literal)) return { kind: "date", raw: literal, date: literal };

  return { kind: "string", raw: literal, text: literal };
}

/** Parses BQL text; throws BqlParseError on the first syntax problem. */
export function parse(input: string): Query {
  return new Parser(input).parse();
}
