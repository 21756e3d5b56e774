// packages/bql/src/validator.ts
import type { CompareExpr, InExpr, Query, Value } from "./ast.js";
import { leaves } from "./ast.js";
import { BqlValidationError } from "./errors.js";
import type { FieldSpec, FieldType } from "./fields.js";
import { FIELD_NAMES, lookupField } from "./fields.js";
import type { ComparisonOp } from "./token.js";

const ALLOWED_OPS: Record<FieldType, readonly ComparisonOp[]> = {
  bool: ["=", "!="],
  enum: ["=", "!="],
  string: ["=", "!=", "~", "!~"],
  priority: ["=", "!=", "<", ">", "<=", ">="],
  date: ["=", "!=", "<", ">", "<=", ">="],
};

function unknownField(field: string, where = ""): BqlValidationError {
  return new BqlValidationError(
    `unknown field${where}: ${JSON.stringify(field)} (valid: ${FIELD_NAMES.join(", ")})`,
    field,
    field
  );
}

function requireField(field: string): FieldSpec {
  const spec = lookupField(field);
  if (!spec) throw unknownField(field);
  return spec;
}

function checkOperator(field: string, spec: FieldSpec, op: ComparisonOp) {
  const allowed = ALLOWED_OPS[spec.type];
  if (allowed.includes(op)) return;

  const kind = spec.type === "enum" ? "" : `${spec.type === "bool" ? "boolean" : spec.type} `;
  throw new BqlValidationError(
    `operator ${JSON.stringify(op)} is not valid for ${kind}field ${JSON.stringify(field)} (use ${allowed.join(", ")})`,
    field,
    op
  );
}

function checkValue(field: string, spec: FieldSpec, value: Value) {
  switch (spec.type) {
    case "bool":
      if (value.kind !== "bool") {
        throw new BqlValidationError(
          `field ${JSON.stringify(field)} requires a boolean value (true or false), got ${JSON.stringify(value.raw)}`,
          field,
          value.raw
        );
      }
      return;
    case "priority":
      if (value.kind !== "priority") {
        throw new BqlValidationError(
          `field ${JSON.stringify(field)} requires a priority value (P0-P4), got ${JSON.stringify(value.raw)}`,
          field,
          value.raw
        );
      }
      return;
    case "date":
      if (value.kind !== "date") {
        throw new BqlValidationError(
          `field ${JSON.stringify(field)} requires a date value (today, yesterday, -Nd, -Nh, -Nm, or ISO date), got ${JSON.stringify(value.raw)}`,
          field,
          value.raw
        );
      }
      return;
    case "enum": {
      const text = value.kind === "string" ? value.text : value.raw;
      if (!spec.values.includes(text)) {
        throw new BqlValidationError(
          `invalid value ${JSON.stringify(text)} for field ${JSON.stringify(field)} (valid: ${spec.values.join(", ")})`,
          field,
          text
        );
      }
      return;
    }
    case "string":
      return;
  }
}

function validateCompare(e: CompareExpr) {
  const spec = requireField(e.field);
  checkOperator(e.field, spec, e.op);
  checkValue(e.field, spec, e.value);
}

function validateIn(e: InExpr) {
  const spec = requireField(e.field);
  if (spec.type === "bool" || spec.type === "date") {
    throw new BqlValidationError(
      `operator ${e.negated ? "NOT IN" : "IN"} is not valid for field ${JSON.stringify(e.field)}`,
      e.field,
      e.negated ? "not in" : "in"
    );
  }
  for (const v of e.values) checkValue(e.field, spec, v);
}

/** Throws BqlValidationError on the first field, operator or value the registry rejects. */
export function validate(query: Query): void {
  for (const leaf of leaves(query.filter)) {
    if (leaf.kind === "compare") validateCompare(leaf);
    else validateIn(leaf);
  }

  for (const term of query.order_by) {
    if (!lookupField(term.field)) throw unknownField(term.field, " in ORDER BY");
  }
}
