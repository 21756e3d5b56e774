// packages/bql/src/token.ts

export type TokenType =
  | "EOF"
  | "ILLEGAL"
  // literals
  | "IDENT"
  | "STRING"
  | "NUMBER"
  // delimiters
  | "LPAREN"
  | "RPAREN"
  | "COMMA"
  | "STAR"
  // comparison operators
  | "EQ"
  | "NEQ"
  | "LT"
  | "GT"
  | "LTE"
  | "GTE"
  | "CONTAINS"
  | "NOT_CONTAINS"
  // keywords
  | "AND"
  | "OR"
  | "NOT"
  | "IN"
  | "ORDER"
  | "BY"
  | "ASC"
  | "DESC"
  | "TRUE"
  | "FALSE"
  | "EXPAND"
  | "DEPTH";

export type Token = {
  type: TokenType;
  literal: string;
  // 1-based UTF-16 offset of the first character, so `pos - 1` indexes the input string directly
  pos: number;
};

export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  and: "AND",
  or: "OR",
  not: "NOT",
  in: "IN",
  order: "ORDER",
  by: "BY",
  asc: "ASC",
  desc: "DESC",
  true: "TRUE",
  false: "FALSE",
  expand: "EXPAND",
  depth: "DEPTH",
};

/** Keyword token type for an identifier, matched case-insensitively. */
export function lookupIdent(ident: string): TokenType {
  return KEYWORDS[ident.toLowerCase()] ?? "IDENT";
}

export type ComparisonOp = "=" | "!=" | "<" | ">" | "<=" | ">=" | "~" | "!~";

const OPS: Partial<Record<TokenType, ComparisonOp>> = {
  EQ: "=",
  NEQ: "!=",
  LT: "<",
  GT: ">",
  LTE: "<=",
  GTE: ">=",
  CONTAINS: "~",
  NOT_CONTAINS: "!~",
};

export function comparisonOpOf(type: TokenType): ComparisonOp | null {
  return OPS[type] ?? null;
}

export function isComparisonOp(type: TokenType): boolean {
  return comparisonOpOf(type) !== null;
}
