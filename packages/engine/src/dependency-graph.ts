// packages/engine/src/dependency-graph.ts
import type Database from "better-sqlite3";

import type { ExpandDepth, ExpandDirection } from "../../bql/src/ast.js";
import { DEPTH_UNLIMITED } from "../../bql/src/ast.js";
import type { DependencyRow } from "./issue.js";
import { DependencyRowSchema } from "./issue.js";

export type IssueId = string;

export type Edge = {
  target_id: IssueId;
  type: string;
};

/** forward: subject -> objects (child -> parent, blocked -> blocker); reverse is its mirror. */
export type DependencyGraph = {
  forward: Map<IssueId, Edge[]>;
  reverse: Map<IssueId, Edge[]>;
};

/** Level ceiling for `depth *`. */
export const MAX_EXPAND_ITERATIONS = 100;

export function buildDependencyGraph(rows: Iterable<DependencyRow>): DependencyGraph {
  const forward = new Map<IssueId, Edge[]>();
  const reverse = new Map<IssueId, Edge[]>();

  for (const r of rows) {
    const f = forward.get(r.issue_id) ?? [];
    f.push({ target_id: r.depends_on_id, type: r.type });
    forward.set(r.issue_id, f);

    const b = reverse.get(r.depends_on_id) ?? [];
    b.push({ target_id: r.issue_id, type: r.type });
    reverse.set(r.depends_on_id, b);
  }

  return { forward, reverse };
}

export const DEPENDENCY_GRAPH_SQL = `
  SELECT d.issue_id, d.depends_on_id, d.type
  FROM dependencies d
  JOIN issues a ON a.id = d.issue_id
  JOIN issues b ON b.id = d.depends_on_id
  WHERE a.status NOT IN ('deleted', 'tombstone') AND a.deleted_at IS NULL
    AND b.status NOT IN ('deleted', 'tombstone') AND b.deleted_at IS NULL
`;

/** Every edge whose two endpoints are live issues, in one query. */
export function loadDependencyGraph(db: Database.Database): DependencyGraph {
  const rows = db.prepare(DEPENDENCY_GRAPH_SQL).all();
  return buildDependencyGraph(rows.map((r) => DependencyRowSchema.parse(r)));
}

export type ExpandResult = {
  ids: IssueId[]; // base ids first, then discovery order
  truncated: boolean;
  levels: number; // levels that added at least one id
};

export type ExpandOptions = {
  signal?: AbortSignal;
};

function neighbours(graph: DependencyGraph, id: IssueId, direction: ExpandDirection): Edge[] {
  switch (direction) {
    case "UP":
      return graph.forward.get(id) ?? [];
    case "DOWN":
      return graph.reverse.get(id) ?? [];
    case "ALL":
      return [...(graph.forward.get(id) ?? []), ...(graph.reverse.get(id) ?? [])];
  }
}

/**
 * Level-by-level BFS from `baseIds`. Cycles and self-loops terminate through
 * the visited set; `depth: "unlimited"` stops at MAX_EXPAND_ITERATIONS levels
 * and reports `truncated` when the last level still had unvisited neighbours.
 */
export function expandIds(
  graph: DependencyGraph,
  baseIds: readonly IssueId[],
  direction: ExpandDirection,
  depth: ExpandDepth,
  opts: ExpandOptions = {}
): ExpandResult {
  const visited = new Set<IssueId>(baseIds);
  const ids = [...visited];

  const maxLevels = depth === DEPTH_UNLIMITED ? MAX_EXPAND_ITERATIONS : Math.max(0, depth);

  let frontier = [...visited];
  let levels = 0;

  while (levels < maxLevels && frontier.length > 0) {
    opts.signal?.throwIfAborted();

    const next: IssueId[] = [];
    for (const id of frontier) {
      for (const e of neighbours(graph, id, direction)) {
        if (visited.has(e.target_id)) continue;
        visited.add(e.target_id);
        next.push(e.target_id);
      }
    }

    if (next.length === 0) {
      frontier = next;
      break;
    }

    ids.push(...next);
    frontier = next;
    levels++;
  }

  const truncated =
    depth === DEPTH_UNLIMITED &&
    levels >= maxLevels &&
    frontier.some((id) => neighbours(graph, id, direction).some((e) => !visited.has(e.target_id)));
  return { ids, truncated, levels };
}
