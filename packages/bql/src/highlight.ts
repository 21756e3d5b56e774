// packages/bql/src/highlight.ts
import { IssueStatusSchema, IssueTypeSchema } from "./fields.js";
import { Lexer } from "./lexer.js";
import type { TokenType } from "./token.js";
import { isComparisonOp } from "./token.js";

export type SyntaxKind = "keyword" | "operator" | "paren" | "comma" | "string" | "literal" | "field" | "value";

/** `start` inclusive, `end` exclusive, both 0-based offsets into the line. */
export type SyntaxSpan = { start: number; end: number; kind: SyntaxKind };

const KEYWORD_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  "AND",
  "OR",
  "NOT",
  "IN",
  "ORDER",
  "BY",
  "ASC",
  "DESC",
  "EXPAND",
  "DEPTH",
]);

const KNOWN_VALUES: ReadonlySet<string> = new Set<string>([
  ...IssueTypeSchema.options,
  ...IssueStatusSchema.options,
  "today",
  "yesterday",
]);

function isKnownValue(ident: string): boolean {
  return /^[pP][0-4]$/.test(ident) || KNOWN_VALUES.has(ident.toLowerCase());
}

// Offset just past the closing quote, or the end of the line when unterminated.
function stringEnd(line: string, start: number): number {
  const quote = line.charAt(start);
  let i = start + 1;
  while (i < line.length) {
    const ch = line.charAt(i);
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    i++;
  }
  return line.length;
}

function kindOf(type: TokenType): SyntaxKind | null {
  if (KEYWORD_TYPES.has(type)) return "keyword";
  if (isComparisonOp(type) || type === "STAR") return "operator";

  switch (type) {
    case "LPAREN":
    case "RPAREN":
      return "paren";
    case "COMMA":
      return "comma";
    case "STRING":
      return "string";
    case "NUMBER":
    case "TRUE":
    case "FALSE":
      return "literal";
    case "IDENT":
      return "field";
    default:
      return null;
  }
}

/**
 * Classifies one line of BQL for an editor. Identifiers after a comparison
 * operator or inside `in (...)` are values: known ones come back as `value`,
 * the rest are left unstyled. ILLEGAL characters are skipped.
 */
export function classifySyntax(line: string): SyntaxSpan[] {
  const spans: SyntaxSpan[] = [];
  if (!line) return spans;

  const lexer = new Lexer(line);
  let inValueList = false;
  let afterOperator = false;
  let prev: TokenType = "EOF";

  for (let tok = lexer.nextToken(); tok.type !== "EOF"; tok = lexer.nextToken()) {
    const start = tok.pos - 1;

    if (tok.type === "LPAREN" && prev === "IN") inValueList = true;
    else if (tok.type === "RPAREN" && inValueList) inValueList = false;

    if (isComparisonOp(tok.type)) afterOperator = true;
    else if (tok.type === "AND" || tok.type === "OR" || tok.type === "NOT" || tok.type === "ORDER") {
      afterOperator = false;
    }

    prev = tok.type;

    if (tok.type === "IDENT" && (inValueList || afterOperator)) {
      afterOperator = false;
      if (isKnownValue(tok.literal)) {
        spans.push({ start, end: start + tok.literal.length, kind: "value" });
      }
      continue;
    }

    const kind = kindOf(tok.type);
    if (!kind) continue;

    const end = tok.type === "STRING" ? stringEnd(line, start) : start + tok.literal.length;
    spans.push({ start, end, kind });

    if (kind === "string" || kind === "literal") afterOperator = false;
  }

  return spans;
}
