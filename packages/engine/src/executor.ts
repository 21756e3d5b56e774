// packages/engine/src/executor.ts
import type Database from "better-sqlite3";

import { InMemoryCacheManager, DEFAULT_EXPIRATION_MS } from "../../cache/src/cache-manager.js";
import type { CacheManager } from "../../cache/src/cache-manager.js";
import { ReadThroughCache } from "../../cache/src/read-through-cache.js";
import type { ExpandClause, ExpandDepth, ExpandDirection, Query } from "../../bql/src/ast.js";
import { BqlExecutionError, BqlQueryError } from "../../bql/src/errors.js";
import type { QueryStage } from "../../bql/src/errors.js";
import { parse } from "../../bql/src/parser.js";
import type { SqlParam } from "../../bql/src/sql-builder.js";
import { compileQuery } from "../../bql/src/sql-builder.js";
import { validate } from "../../bql/src/validator.js";
import type { DependencyGraph } from "./dependency-graph.js";
import { expandIds, loadDependencyGraph } from "./dependency-graph.js";
import type { Issue } from "./issue.js";
import {
  CommentCountRowSchema,
  DependencyRowSchema,
  ISSUE_COLUMNS,
  IssueRowSchema,
  LabelRowSchema,
  issueFromRow,
} from "./issue.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";

export const DEPENDENCY_GRAPH_CACHE_KEY = "__dependency_graph__";

export type ExpansionReport = {
  direction: ExpandDirection;
  depth: ExpandDepth;
  base_count: number;
  expanded_count: number;
  levels: number;
  truncated: boolean;
};

/** What the query cache holds per query text. */
export type QueryOutcome = {
  issues: Issue[];
  expansion: ExpansionReport | null;
};

export type QueryResult = QueryOutcome & {
  query: string;
  elapsed_ms: number;
};

export type QueryExecutorOptions = {
  queryCache?: CacheManager<string, QueryOutcome>;
  graphCache?: CacheManager<string, DependencyGraph>;
  ttlMs?: number;
  cacheDisabled?: boolean;
  logger?: Logger;
  now?: () => number;
};

export type ExecuteOptions = {
  signal?: AbortSignal;
};

const LIVE_ISSUE = "i.status NOT IN ('deleted', 'tombstone') AND i.deleted_at IS NULL";
const LIVE_OTHER = "o.status NOT IN ('deleted', 'tombstone') AND o.deleted_at IS NULL";

const BASE_SQL = `SELECT ${ISSUE_COLUMNS.map((c) => `i.${c}`).join(", ")} FROM issues i WHERE ${LIVE_ISSUE}`;

function placeholders(n: number): string {
  return Array.from({ length: n }, () => "?").join(", ");
}

/**
 * Runs BQL against an issue store.
 *
 * Results are cached per query text and the dependency graph under one
 * sentinel key; both live until their TTL runs out or `invalidate()` is
 * called (typically from a store watcher).
 */
export class QueryExecutor {
  private readonly logger: Logger;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly owned: Array<{ close(): void }> = [];
  private readonly expanding = new Set<string>(); // cached query texts that depend on the graph

  private readonly queries: ReadThroughCache<string, QueryOutcome, Query>;
  private readonly graph: ReadThroughCache<string, DependencyGraph, null>;

  constructor(
    private readonly db: Database.Database,
    opts: QueryExecutorOptions = {}
  ) {
    this.logger = opts.logger ?? createLogger("[bql] ");
    this.ttlMs = opts.ttlMs ?? DEFAULT_EXPIRATION_MS;
    this.now = opts.now ?? (() => Date.now());

    const queryCache = opts.queryCache ?? this.own(new InMemoryCacheManager<string, QueryOutcome>("bql-queries"));
    const graphCache =
      opts.graphCache ?? this.own(new InMemoryCacheManager<string, DependencyGraph>("bql-dependency-graph"));
    const disabled = opts.cacheDisabled ?? false;

    this.queries = new ReadThroughCache(
      queryCache,
      (query: Query, _key: string, signal: AbortSignal) => this.load(query, signal),
      disabled
    );
    this.graph = new ReadThroughCache(
      graphCache,
      async (_input: null, _key: string, signal: AbortSignal) => {
        signal.throwIfAborted();
        return this.stage("load dependency graph", () => loadDependencyGraph(this.db));
      },
      disabled
    );
  }

  /** Issues matching `text`: base results first, then expanded ones. */
  async execute(text: string, opts: ExecuteOptions = {}): Promise<Issue[]> {
    return (await this.run(text, opts)).issues;
  }

  async run(text: string, opts: ExecuteOptions = {}): Promise<QueryResult> {
    const started = this.now();
    const { signal } = opts;

    const query = this.check("parse", text, () => parse(text));
    this.check("validate", text, () => validate(query));

    let outcome: QueryOutcome;
    try {
      if (query.expand) this.expanding.add(text);
      outcome = await this.queries.getWithRefresh(text, query, this.ttlMs, signal);
      signal?.throwIfAborted();
    } catch (e) {
      if (signal?.aborted && e === signal.reason) throw e;
      const err = new BqlQueryError("execute", text, e);
      this.logger.error("query failed", { query: text, error: err.message });
      throw err;
    }

    const elapsed_ms = this.now() - started;
    this.logger.debug("query complete", { query: text, count: outcome.issues.length, elapsed_ms });

    return { query: text, ...structuredClone(outcome), elapsed_ms };
  }

  /** Drops cached query results and the dependency graph. */
  invalidate(): void {
    this.queries.invalidateAll();
    this.expanding.clear();
    this.graph.invalidate(DEPENDENCY_GRAPH_CACHE_KEY);
  }

  /** Drops the dependency graph and every cached result of an expanding query. */
  invalidateGraph(): void {
    this.graph.invalidate(DEPENDENCY_GRAPH_CACHE_KEY);
    for (const text of this.expanding) this.queries.invalidate(text);
    this.expanding.clear();
  }

  /** Stops the sweep timers of caches this executor created itself. */
  close(): void {
    for (const m of this.owned) m.close();
  }

  private own<M extends { close(): void }>(m: M): M {
    this.owned.push(m);
    return m;
  }

  private check<T>(stage: Exclude<QueryStage, "execute">, text: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      const err = new BqlQueryError(stage, text, e);
      this.logger.error(`${stage} failed`, { query: text, error: err.message });
      throw err;
    }
  }

  private stage<T>(name: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw new BqlExecutionError(name, e);
    }
  }

  // -------------------------
  // Loading
  // -------------------------
  private async load(query: Query, signal: AbortSignal): Promise<QueryOutcome> {
    const { where, order_by, params } = compileQuery(query);

    signal.throwIfAborted();
    const base = this.fetch(where, params, order_by, signal);

    if (!query.expand) return { issues: base, expansion: null };
    return this.expand(base, query.expand, signal);
  }

  private async expand(base: Issue[], clause: ExpandClause, signal?: AbortSignal): Promise<QueryOutcome> {
    const report: ExpansionReport = {
      direction: clause.direction,
      depth: clause.depth,
      base_count: base.length,
      expanded_count: 0,
      levels: 0,
      truncated: false,
    };
    if (base.length === 0) return { issues: base, expansion: report };

    const graph = await this.graph.getWithRefresh(DEPENDENCY_GRAPH_CACHE_KEY, null, this.ttlMs, signal);

    const baseIds = base.map((i) => i.id);
    const { ids, truncated, levels } = expandIds(graph, baseIds, clause.direction, clause.depth, { signal });
    report.levels = levels;
    report.truncated = truncated;
    if (truncated) this.logger.warn("expansion stopped at the level ceiling", { levels });

    const delta = ids.slice(base.length);
    if (delta.length === 0) return { issues: base, expansion: report };

    signal?.throwIfAborted();
    const rank = new Map(delta.map((id, n) => [id, n]));
    const extra = this.fetch(`i.id IN (${placeholders(delta.length)})`, delta, "", signal).sort(
      (a, b) => (rank.get(a.id) ?? 0) - (rank.get(b.id) ?? 0)
    );

    report.expanded_count = extra.length;
    return { issues: [...base, ...extra], expansion: report };
  }

  /** Live issues matching `where`, with labels, relationships and comment counts attached. */
  private fetch(where: string, params: SqlParam[], orderBy: string, signal?: AbortSignal): Issue[] {
    let sql = BASE_SQL;
    if (where) sql += ` AND ${where}`;
    if (orderBy) sql += ` ORDER BY ${orderBy}`;

    const issues = this.stage("base query", () =>
      this.db
        .prepare(sql)
        .all(...params)
        .map((r) => issueFromRow(IssueRowSchema.parse(r)))
    );
    if (issues.length === 0) return issues;

    signal?.throwIfAborted();
    const byId = new Map(issues.map((i) => [i.id, i]));
    const ids = [...byId.keys()];

    this.stage("load dependencies", () => this.attachDependencies(byId, ids));
    this.stage("load labels", () => this.attachLabels(byId, ids));
    this.stage("load comment counts", () => this.attachCommentCounts(byId, ids));

    return issues;
  }

  private attachDependencies(byId: Map<string, Issue>, ids: string[]) {
    const ph = placeholders(ids.length);
    const rows = this.db
      .prepare(
        `SELECT d.issue_id, d.depends_on_id, d.type
         FROM dependencies d JOIN issues o ON o.id = d.depends_on_id
         WHERE d.issue_id IN (${ph}) AND ${LIVE_OTHER}
         UNION
         SELECT d.issue_id, d.depends_on_id, d.type
         FROM dependencies d JOIN issues o ON o.id = d.issue_id
         WHERE d.depends_on_id IN (${ph}) AND ${LIVE_OTHER}
         ORDER BY issue_id, depends_on_id`
      )
      .all(...ids, ...ids);

    for (const raw of rows) {
      const r = DependencyRowSchema.parse(raw);
      const subject = byId.get(r.issue_id);
      const object = byId.get(r.depends_on_id);

      switch (r.type) {
        case "parent-child":
          if (subject && subject.parent_id === null) subject.parent_id = r.depends_on_id;
          object?.children.push(r.issue_id);
          break;
        case "blocks":
          subject?.blocked_by.push(r.depends_on_id);
          object?.blocks.push(r.issue_id);
          break;
        case "discovered-from":
          subject?.discovered_from.push(r.depends_on_id);
          object?.discovered.push(r.issue_id);
          break;
      }
    }
  }

  private attachLabels(byId: Map<string, Issue>, ids: string[]) {
    const rows = this.db
      .prepare(`SELECT issue_id, label FROM labels WHERE issue_id IN (${placeholders(ids.length)}) ORDER BY issue_id, label`)
      .all(...ids);

    for (const raw of rows) {
      const r = LabelRowSchema.parse(raw);
      byId.get(r.issue_id)?.labels.push(r.label);
    }
  }

  private attachCommentCounts(byId: Map<string, Issue>, ids: string[]) {
    const rows = this.db
      .prepare(
        `SELECT issue_id, COUNT(*) AS count FROM comments WHERE issue_id IN (${placeholders(ids.length)}) GROUP BY issue_id`
      )
      .all(...ids);

    for (const raw of rows) {
      const r = CommentCountRowSchema.parse(raw);
      const issue = byId.get(r.issue_id);
      if (issue) issue.comment_count = r.count;
    }
  }
}
