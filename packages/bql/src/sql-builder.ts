// packages/bql/src/sql-builder.ts
import type { CompareExpr, Expr, InExpr, OrderTerm, Query, Value } from "./ast.js";
import { valueText } from "./ast.js";
import { BqlValidationError } from "./errors.js";
import type { FieldSpec } from "./fields.js";
import { lookupField } from "./fields.js";
import type { ComparisonOp } from "./token.js";

export type SqlParam = string | number;

export type CompiledQuery = {
  where: string; // "" when the query has no filter
  order_by: string;
  params: SqlParam[];
};

export const DEFAULT_ORDER_BY = "i.updated_at DESC";

const BLOCKED_SUBQUERY = "SELECT issue_id FROM blocked_issues_cache";
const READY_SUBQUERY = "SELECT id FROM ready_issues";
const LABEL_SUBQUERY = "SELECT issue_id FROM labels WHERE label";

const OFFSET_UNITS: Readonly<Record<string, { fn: "date" | "datetime"; unit: string }>> = {
  d: { fn: "date", unit: "days" },
  h: { fn: "datetime", unit: "hours" },
  m: { fn: "date", unit: "months" },
};

const OFFSET_RE = /^([+-]?)(\d+)([dhm])$/;

function fieldSpec(field: string): FieldSpec {
  const spec = lookupField(field);
  if (!spec) throw new BqlValidationError(`unknown field: ${JSON.stringify(field)}`, field, field);
  return spec;
}

function placeholders(n: number): string {
  return Array.from({ length: n }, () => "?").join(", ");
}

/**
 * Compiles a validated query into a WHERE fragment (columns prefixed `i.`),
 * an ORDER BY fragment and positional parameters. Pure.
 */
export function compileQuery(query: Query): CompiledQuery {
  const params: SqlParam[] = [];

  // -------------------------
  // Dates
  // -------------------------
  const dateExpr = (date: string): string => {
    if (date === "today") {
      params.push("+0 days");
      return "date('now', ?)";
    }
    if (date === "yesterday") {
      params.push("-1 days");
      return "date('now', ?)";
    }

    const m = OFFSET_RE.exec(date);
    const unit = m ? OFFSET_UNITS[m[3]] : undefined;
    if (m && unit) {
      params.push(`${m[1] === "-" ? "-" : "+"}${m[2]} ${unit.unit}`);
      return `${unit.fn}('now', ?)`;
    }

    params.push(date);
    return "?";
  };

  // -------------------------
  // Leaves
  // -------------------------
  const bind = (spec: FieldSpec, v: Value): void => {
    if (spec.type === "priority" && v.kind === "priority") params.push(v.level);
    else params.push(valueText(v));
  };

  const compare = (e: CompareExpr): string => {
    const spec = fieldSpec(e.field);
    const op: ComparisonOp = e.op;

    if (e.field === "blocked" || e.field === "ready") {
      const truth = (e.value.kind === "bool" && e.value.bool) !== (op === "!=");
      const sub = e.field === "blocked" ? BLOCKED_SUBQUERY : READY_SUBQUERY;
      return `i.id ${truth ? "IN" : "NOT IN"} (${sub})`;
    }

    if (e.field === "label" || e.field === "labels") {
      const negated = op === "!=" || op === "!~";
      const like = op === "~" || op === "!~";
      params.push(like ? `%${valueText(e.value)}%` : valueText(e.value));
      return `i.id ${negated ? "NOT IN" : "IN"} (${LABEL_SUBQUERY} ${like ? "LIKE" : "="} ?)`;
    }

    switch (spec.type) {
      case "bool":
        params.push(e.value.kind === "bool" && e.value.bool ? 1 : 0);
        return `${spec.column} ${op} ?`;
      case "date":
        return `datetime(${spec.column}) ${op} ${dateExpr(valueText(e.value))}`;
      default:
        if (op === "~" || op === "!~") {
          params.push(`%${valueText(e.value)}%`);
          return `${spec.column} ${op === "~" ? "LIKE" : "NOT LIKE"} ?`;
        }
        bind(spec, e.value);
        return `${spec.column} ${op} ?`;
    }
  };

  const inList = (e: InExpr): string => {
    const spec = fieldSpec(e.field);
    const not = e.negated ? "NOT IN" : "IN";

    if (e.field === "label" || e.field === "labels") {
      for (const v of e.values) params.push(valueText(v));
      return `i.id ${not} (${LABEL_SUBQUERY} IN (${placeholders(e.values.length)}))`;
    }

    for (const v of e.values) bind(spec, v);
    return `${spec.column} ${not} (${placeholders(e.values.length)})`;
  };

  const build = (expr: Expr): string => {
    switch (expr.kind) {
      case "binary":
        return `(${build(expr.left)} ${expr.op} ${build(expr.right)})`;
      case "not":
        return `NOT (${build(expr.expr)})`;
      case "compare":
        return compare(expr);
      case "in":
        return inList(expr);
    }
  };

  const where = query.filter ? build(query.filter) : "";
  const order_by = query.order_by.length ? query.order_by.map(orderTerm).join(", ") : DEFAULT_ORDER_BY;

  return { where, order_by, params };
}

function orderTerm(term: OrderTerm): string {
  const dir = term.descending ? "DESC" : "ASC";

  switch (term.field) {
    case "blocked":
      return `(i.id IN (${BLOCKED_SUBQUERY})) ${dir}`;
    case "ready":
      return `(i.id IN (${READY_SUBQUERY})) ${dir}`;
    case "label":
    case "labels":
      return `(SELECT MIN(label) FROM labels WHERE issue_id = i.id) ${dir}`;
    default:
      return `${fieldSpec(term.field).column} ${dir}`;
  }
}
