// packages/bql/src/fields.ts
import { z } from "zod";

export const IssueTypeSchema = z.enum(["bug", "feature", "task", "epic", "chore"]);
export type IssueType = z.infer<typeof IssueTypeSchema>;

export const IssueStatusSchema = z.enum(["open", "in_progress", "closed", "blocked"]);
export type IssueStatus = z.infer<typeof IssueStatusSchema>;

export type FieldType = "string" | "enum" | "priority" | "bool" | "date";

export type FieldSpec =
  | { type: "enum"; column: string; values: readonly string[] }
  | { type: "string" | "priority" | "bool" | "date"; column: string; pseudo?: true };

/**
 * Closed field registry, in display order. `column` is the SQL expression the
 * field compiles to; pseudo fields have no column of their own and are
 * compiled as membership subqueries.
 */
export const FIELDS: Readonly<Record<string, FieldSpec>> = {
  type: { type: "enum", column: "i.issue_type", values: IssueTypeSchema.options },
  status: { type: "enum", column: "i.status", values: IssueStatusSchema.options },
  priority: { type: "priority", column: "i.priority" },
  blocked: { type: "bool", column: "", pseudo: true },
  ready: { type: "bool", column: "", pseudo: true },
  pinned: { type: "bool", column: "COALESCE(i.pinned, 0)" },
  label: { type: "string", column: "", pseudo: true },
  labels: { type: "string", column: "", pseudo: true },
  title: { type: "string", column: "i.title" },
  description: { type: "string", column: "i.description" },
  id: { type: "string", column: "i.id" },
  assignee: { type: "string", column: "COALESCE(i.assignee, '')" },
  created: { type: "date", column: "i.created_at" },
  updated: { type: "date", column: "i.updated_at" },
};

export const FIELD_NAMES: readonly string[] = Object.keys(FIELDS);

export function lookupField(name: string): FieldSpec | null {
  return Object.prototype.hasOwnProperty.call(FIELDS, name) ? FIELDS[name] : null;
}
