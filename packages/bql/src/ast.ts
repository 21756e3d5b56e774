// packages/bql/src/ast.ts
import type { ComparisonOp } from "./token.js";

// -------------------------
// Values
// -------------------------
export type PriorityLevel = 0 | 1 | 2 | 3 | 4;

export type StringValue = { kind: "string"; raw: string; text: string };
export type IntValue = { kind: "int"; raw: string; int: number };
export type BoolValue = { kind: "bool"; raw: string; bool: boolean };
export type PriorityValue = { kind: "priority"; raw: string; level: PriorityLevel };

/**
 * `date` is normalized: "today", "yesterday", a signed offset ("-7d", "+24h", "-3m"),
 * or an absolute ISO date as written.
 */
export type DateValue = { kind: "date"; raw: string; date: string };

export type Value = StringValue | IntValue | BoolValue | PriorityValue | DateValue;
export type ValueKind = Value["kind"];

/** The text a value compares as against string columns. */
export function valueText(v: Value): string {
  switch (v.kind) {
    case "string":
      return v.text;
    case "date":
      return v.date;
    default:
      return v.raw;
  }
}

// -------------------------
// Expressions
// -------------------------
export type BinaryExpr = { kind: "binary"; op: "AND" | "OR"; left: Expr; right: Expr };
export type NotExpr = { kind: "not"; expr: Expr };
export type CompareExpr = { kind: "compare"; field: string; op: ComparisonOp; value: Value };
export type InExpr = { kind: "in"; field: string; values: Value[]; negated: boolean };

export type Expr = BinaryExpr | NotExpr | CompareExpr | InExpr;

// -------------------------
// Query
// -------------------------
export type ExpandDirection = "UP" | "DOWN" | "ALL";

export const DEPTH_DEFAULT = 1;
export const DEPTH_MAX = 10;
export const DEPTH_UNLIMITED = "unlimited";

export type ExpandDepth = number | typeof DEPTH_UNLIMITED;

export type ExpandClause = {
  direction: ExpandDirection;
  depth: ExpandDepth;
};

export type OrderTerm = {
  field: string;
  descending: boolean;
};

export type Query = {
  filter: Expr | null;
  expand: ExpandClause | null;
  order_by: OrderTerm[];
};

/** Comparison and IN leaves in source order. */
export function leaves(expr: Expr | null): Array<CompareExpr | InExpr> {
  if (!expr) return [];
  switch (expr.kind) {
    case "binary":
      return [...leaves(expr.left), ...leaves(expr.right)];
    case "not":
      return leaves(expr.expr);
    case "compare":
    case "in":
      return [expr];
  }
}
