// packages/bql/__tests__/bql.sql-builder.test.ts
import { describe, expect, it } from "vitest";

import type { Query } from "../src/ast.js";
import { leaves } from "../src/ast.js";
import { parse } from "../src/parser.js";
import { compileQuery } from "../src/sql-builder.js";
import { validate } from "../src/validator.js";

// blocked and ready compile to subqueries without a bound value
function boundValues(q: Query): number {
  return leaves(q.filter).reduce((n, leaf) => {
    if (leaf.kind === "in") return n + leaf.values.length;
    return leaf.field === "blocked" || leaf.field === "ready" ? n : n + 1;
  }, 0);
}

function compile(input: string) {
  const q = parse(input);
  validate(q);
  return compileQuery(q);
}

describe("bql: sql builder", () => {
  it("compiles a comparison with the default ordering", () => {
    expect(compile("type = bug")).toEqual({
      where: "i.issue_type = ?",
      order_by: "i.updated_at DESC",
      params: ["bug"],
    });
  });

  it("compiles boolean structure", () => {
    expect(compile("type = bug and priority <= P1")).toMatchObject({
      where: "(i.issue_type = ? AND i.priority <= ?)",
      params: ["bug", 1],
    });
    expect(compile("not (status = closed or status = open)")).toMatchObject({
      where: "NOT ((i.status = ? OR i.status = ?))",
      params: ["closed", "open"],
    });
  });

  it.each([
    ["blocked = true", "i.id IN (SELECT issue_id FROM blocked_issues_cache)"],
    ["blocked != true", "i.id NOT IN (SELECT issue_id FROM blocked_issues_cache)"],
    ["ready = false", "i.id NOT IN (SELECT id FROM ready_issues)"],
    ["ready != false", "i.id IN (SELECT id FROM ready_issues)"],
  ])("compiles %j without parameters", (input, where) => {
    expect(compile(input)).toMatchObject({ where, params: [] });
  });

  it("compiles label membership", () => {
    expect(compile("label = urgent")).toMatchObject({
      where: "i.id IN (SELECT issue_id FROM labels WHERE label = ?)",
      params: ["urgent"],
    });
    expect(compile("labels !~ wip")).toMatchObject({
      where: "i.id NOT IN (SELECT issue_id FROM labels WHERE label LIKE ?)",
      params: ["%wip%"],
    });
    expect(compile("label in (a, b)")).toMatchObject({
      where: "i.id IN (SELECT issue_id FROM labels WHERE label IN (?, ?))",
      params: ["a", "b"],
    });
    expect(compile("label not in (a)").where).toBe("i.id NOT IN (SELECT issue_id FROM labels WHERE label IN (?))");
  });

  it("compiles contains and nullable columns", () => {
    expect(compile("title ~ login")).toMatchObject({ where: "i.title LIKE ?", params: ["%login%"] });
    expect(compile("description !~ spam")).toMatchObject({ where: "i.description NOT LIKE ?", params: ["%spam%"] });
    expect(compile('assignee = ""')).toMatchObject({ where: "COALESCE(i.assignee, '') = ?", params: [""] });
    expect(compile("pinned = true")).toMatchObject({ where: "COALESCE(i.pinned, 0) = ?", params: [1] });
    expect(compile("pinned != false")).toMatchObject({ where: "COALESCE(i.pinned, 0) != ?", params: [0] });
  });

  it.each([
    ["created > today", "datetime(i.created_at) > date('now', ?)", "+0 days"],
    ["updated >= yesterday", "datetime(i.updated_at) >= date('now', ?)", "-1 days"],
    ["created > -7d", "datetime(i.created_at) > date('now', ?)", "-7 days"],
    ["updated > -24h", "datetime(i.updated_at) > datetime('now', ?)", "-24 hours"],
    ["created < -3m", "datetime(i.created_at) < date('now', ?)", "-3 months"],
    ["created < 2d", "datetime(i.created_at) < date('now', ?)", "+2 days"],
    ['created >= "2024-01-15"', "datetime(i.created_at) >= ?", "2024-01-15"],
  ])("compiles %j with one bound parameter", (input, where, param) => {
    expect(compile(input)).toMatchObject({ where, params: [param] });
  });

  it("compiles IN lists", () => {
    expect(compile("priority in (P0, P1)")).toMatchObject({ where: "i.priority IN (?, ?)", params: [0, 1] });
    expect(compile("type not in (bug, epic)")).toMatchObject({
      where: "i.issue_type NOT IN (?, ?)",
      params: ["bug", "epic"],
    });
  });

  it("compiles order by terms", () => {
    expect(compile("order by priority asc, created desc").order_by).toBe("i.priority ASC, i.created_at DESC");
    expect(compile("order by blocked desc").order_by).toBe(
      "(i.id IN (SELECT issue_id FROM blocked_issues_cache)) DESC"
    );
    expect(compile("order by label").order_by).toBe("(SELECT MIN(label) FROM labels WHERE issue_id = i.id) ASC");
  });

  it("leaves the where clause empty without a filter", () => {
    expect(compile("expand down")).toEqual({ where: "", order_by: "i.updated_at DESC", params: [] });
  });

  it.each([
    "type = bug and priority in (P0, P1, P2) and ready = true",
    "label in (a, b, c) or title ~ x or created > -7d",
    "not (blocked = true) and updated > today and assignee != bob and pinned = false",
    'status not in (closed) and created >= "2024-01-01" and created < -1h',
  ])("binds one parameter per placeholder and per value: %j", (input) => {
    const { where, params } = compile(input);
    expect(where.split("?").length - 1).toBe(params.length);
    expect(params).toHaveLength(boundValues(parse(input)));
  });
});
