// packages/engine/src/issue.ts
import { z } from "zod";

export type Issue = {
  id: string;
  title: string;
  description: string;
  design: string;
  acceptance_criteria: string;
  notes: string;
  status: string;
  priority: number;
  issue_type: string;
  assignee: string;
  pinned: boolean | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;

  // batch-attached
  labels: string[];
  parent_id: string | null;
  blocked_by: string[];
  blocks: string[];
  children: string[];
  discovered_from: string[];
  discovered: string[];
  comment_count: number;
};

// -------------------------
// Row shapes (as better-sqlite3 returns them)
// -------------------------
const text = z.string().nullable();

export const IssueRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: text,
  design: text,
  acceptance_criteria: text,
  notes: text,
  status: z.string(),
  priority: z.number().int(),
  issue_type: z.string(),
  assignee: text,
  pinned: z.number().int().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  closed_at: text,
});
export type IssueRow = z.infer<typeof IssueRowSchema>;

/**
 * One relationship. `issue_id` is the subject (child, blocked issue, discovery),
 * `depends_on_id` the object (parent, blocker, origin). `type` is one of
 * blocks, parent-child, discovered-from or related; other values pass through.
 */
export const DependencyRowSchema = z.object({
  issue_id: z.string(),
  depends_on_id: z.string(),
  type: z.string(),
});
export type DependencyRow = z.infer<typeof DependencyRowSchema>;

export const LabelRowSchema = z.object({ issue_id: z.string(), label: z.string() });
export const CommentCountRowSchema = z.object({ issue_id: z.string(), count: z.number().int() });

export const ISSUE_COLUMNS = [
  "id",
  "title",
  "description",
  "design",
  "acceptance_criteria",
  "notes",
  "status",
  "priority",
  "issue_type",
  "assignee",
  "pinned",
  "created_at",
  "updated_at",
  "closed_at",
] as const;

export function issueFromRow(row: IssueRow): Issue {
  return {
    id: row.id,
    title: row.title,
    description: row.description ?? "",
    design: row.design ?? "",
    acceptance_criteria: row.acceptance_criteria ?? "",
    notes: row.notes ?? "",
    status: row.status,
    priority: row.priority,
    issue_type: row.issue_type,
    assignee: row.assignee ?? "",
    pinned: row.pinned === null ? null : row.pinned !== 0,
    created_at: row.created_at,
    updated_at: row.updated_at,
    closed_at: row.closed_at,
    labels: [],
    parent_id: null,
    blocked_by: [],
    blocks: [],
    children: [],
    discovered_from: [],
    discovered: [],
    comment_count: 0,
  };
}
