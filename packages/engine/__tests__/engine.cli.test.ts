// packages/engine/__tests__/engine.cli.test.ts
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";

import type { CliIO } from "../src/cli/bql.js";
import { CLI_VERSION, run } from "../src/cli/bql.js";
import { ensureIssueTables } from "../src/schema.js";
import { addChild, addIssues } from "./_helpers/fixture-db.js";

function captureIO(env: NodeJS.ProcessEnv = { BQL_LOG_LEVEL: "silent" }) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (s) => {
      out.push(s);
    },
    err: (s) => {
      err.push(s);
    },
    env,
  };
  return { io, out: () => out.join(""), err: () => err.join("") };
}

const bql = (...args: string[]) => ["node", "bql", ...args];

const dirs: string[] = [];

function seededDb(): string {
  const dir = mkdtempSync(join(tmpdir(), "bql-cli-"));
  dirs.push(dir);
  const file = join(dir, "issues.db");

  const db = new Database(file);
  ensureIssueTables(db);
  addIssues(
    db,
    { id: "a", title: "Fix login", issue_type: "bug", priority: 1 },
    { id: "b", title: "Add search", issue_type: "feature" }
  );
  addChild(db, "a", "b");
  db.close();
  return file;
}

describe("engine: bql cli", () => {
  afterEach(() => {
    for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
  });

  it("prints the version and usage", async () => {
    const v = captureIO();
    expect(await run(bql("version"), v.io)).toBe(0);
    expect(v.out()).toBe(`${CLI_VERSION}\n`);

    const h = captureIO();
    expect(await run(bql("help"), h.io)).toBe(0);
    expect(h.out().startsWith("bql - query an issue store with BQL\n")).toBe(true);
  });

  it("rejects unknown commands", async () => {
    const c = captureIO();
    expect(await run(bql("frobnicate"), c.io)).toBe(1);
    expect(c.err().startsWith("Unknown command: frobnicate\n")).toBe(true);
  });

  it("lists tokens with positions", async () => {
    const c = captureIO();
    expect(await run(bql("tokens", "type = bug"), c.io)).toBe(0);
    expect(c.out()).toBe('1\tIDENT\t"type"\n6\tEQ\t"="\n8\tIDENT\t"bug"\n11\tEOF\t""\n');
  });

  it("prints the compiled SQL for a valid query", async () => {
    const c = captureIO();
    expect(await run(bql("check", "type = bug expand down depth 2"), c.io)).toBe(0);
    expect(c.out()).toBe(
      'WHERE    i.issue_type = ?\nORDER BY i.updated_at DESC\nPARAMS   ["bug"]\nEXPAND   DOWN depth 2\n'
    );
  });

  it("reports invalid queries with their stage", async () => {
    const c = captureIO();
    expect(await run(bql("check", "foo = bar"), c.io)).toBe(1);
    expect(c.err().startsWith('[bql] validation error: unknown field: "foo"')).toBe(true);
  });

  it("requires a database for queries", async () => {
    const c = captureIO({});
    expect(await run(bql("query", "type = bug"), c.io)).toBe(1);
    expect(c.err()).toBe("[bql] no database: pass --db <path> or set BQL_DB\n");
  });

  it("runs a query against a database file", async () => {
    const file = seededDb();

    const c = captureIO();
    expect(await run(bql("query", "type = bug", "--db", file), c.io)).toBe(0);
    expect(c.out()).toBe("a  P1  bug  open  Fix login\n1 issue(s)\n");
  });

  it("takes the database from BQL_DB and prints JSON", async () => {
    const file = seededDb();

    const c = captureIO({ BQL_DB: file, BQL_LOG_LEVEL: "silent" });
    expect(await run(bql("query", 'id = "a" expand down', "--json"), c.io)).toBe(0);

    const parsed: unknown = JSON.parse(c.out());
    expect(parsed).toMatchObject([
      { id: "a", children: ["b"] },
      { id: "b", parent_id: "a" },
    ]);
  });

  it("refuses a missing database file unless --init is given", async () => {
    const dir = mkdtempSync(join(tmpdir(), "bql-cli-"));
    dirs.push(dir);
    const file = join(dir, "fresh.db");

    const missing = captureIO();
    expect(await run(bql("query", "status = open", "--db", file), missing.io)).toBe(1);
    expect(missing.err().startsWith("[bql] ")).toBe(true);

    const init = captureIO();
    expect(await run(bql("query", "status = open", "--db", file, "--init"), init.io)).toBe(0);
    expect(init.out()).toBe("0 issue(s)\n");
  });
});
