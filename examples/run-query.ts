// examples/run-query.ts
import Database from "better-sqlite3";

import { QueryExecutor } from "../packages/engine/src/executor.js";
import { ensureIssueTables } from "../packages/engine/src/schema.js";
import { createLogger } from "../packages/engine/src/logger.js";

// ---- tiny assert helper ----
function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

function seed(db: Database.Database) {
  const insert = db.prepare(
    `INSERT INTO issues (id, title, status, priority, issue_type, assignee, created_at, updated_at)
     VALUES (?,?,?,?,?,?,datetime('now', ?),datetime('now', ?))`
  );
  insert.run("demo-1", "Fix login redirect", "open", 0, "bug", "alice", "-10 days", "-1 hours");
  insert.run("demo-2", "Add saved searches", "open", 1, "feature", null, "-3 days", "-2 days");
  insert.run("demo-3", "Refactor auth module", "in_progress", 2, "task", "bob", "-20 days", "-5 days");
  insert.run("demo-4", "Update onboarding docs", "closed", 3, "chore", null, "-30 days", "-30 days");
  insert.run("demo-5", "Session expires early", "open", 1, "bug", null, "-2 hours", "-2 hours");

  db.prepare(`INSERT INTO labels (issue_id, label) VALUES (?,?)`).run("demo-1", "auth");
  db.prepare(`INSERT INTO labels (issue_id, label) VALUES (?,?)`).run("demo-3", "auth");
  db.prepare(`INSERT INTO blocked_issues_cache (issue_id) VALUES (?)`).run("demo-3");
}

async function main() {
  const db = new Database(process.argv[2] ?? ":memory:");
  ensureIssueTables(db);
  if (db.prepare(`SELECT COUNT(*) AS n FROM issues`).pluck().get() === 0) seed(db);

  const executor = new QueryExecutor(db, { logger: createLogger("[example] ", "info") });

  const queries = [
    "type = bug and priority <= P1",
    "label = auth order by priority",
    "ready = true order by updated desc",
    "created > -7d",
    'title ~ "auth" or assignee = ""',
  ];

  for (const q of queries) {
    const issues = await executor.execute(q);
    console.log(`\n${q}`);
    for (const i of issues) console.log(`  ${i.id}  P${i.priority}  ${i.issue_type.padEnd(8)} ${i.title}`);
  }

  const bugs = await executor.execute("type = bug");
  assert(bugs.every((i) => i.issue_type === "bug"), "type filter returned a non-bug");

  executor.close();
  db.close();
  console.log("\n✅ run-query OK");
}

main().catch((e: unknown) => {
  console.error("❌ run-query failed:", e);
  process.exitCode = 1;
});
