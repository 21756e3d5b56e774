// examples/run-expand.ts
import Database from "better-sqlite3";

import { QueryExecutor } from "../packages/engine/src/executor.js";
import { ensureIssueTables } from "../packages/engine/src/schema.js";

function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

// epic -> two stories -> one task each; the first task blocks the second story
function seed(db: Database.Database) {
  const issue = db.prepare(`INSERT INTO issues (id, title, issue_type) VALUES (?,?,?)`);
  const dep = db.prepare(`INSERT INTO dependencies (issue_id, depends_on_id, type) VALUES (?,?,?)`);

  issue.run("epic-1", "Checkout redesign", "epic");
  issue.run("story-1", "Cart page", "feature");
  issue.run("story-2", "Payment page", "feature");
  issue.run("task-1", "Cart API", "task");
  issue.run("task-2", "Payment form", "task");

  dep.run("story-1", "epic-1", "parent-child");
  dep.run("story-2", "epic-1", "parent-child");
  dep.run("task-1", "story-1", "parent-child");
  dep.run("task-2", "story-2", "parent-child");
  dep.run("story-2", "task-1", "blocks");
}

async function main() {
  const db = new Database(":memory:");
  ensureIssueTables(db);
  seed(db);

  const executor = new QueryExecutor(db);

  for (const q of [
    'id = "epic-1" expand down',
    'id = "epic-1" expand down depth *',
    'id = "task-2" expand up depth *',
    'id = "task-1" expand all depth 2',
  ]) {
    const result = await executor.run(q);
    console.log(`\n${q}`);
    console.log(`  ${result.issues.map((i) => i.id).join(", ")}`);
    console.log(`  levels=${result.expansion?.levels ?? 0} truncated=${result.expansion?.truncated ?? false}`);
  }

  const all = await executor.execute('id = "epic-1" expand down depth *');
  assert(all.length === 5, `expected the whole tree, got ${all.length}`);
  assert(all[0]?.id === "epic-1", "base issue must come first");

  executor.close();
  db.close();
  console.log("\n✅ run-expand OK");
}

main().catch((e: unknown) => {
  console.error("❌ run-expand failed:", e);
  process.exitCode = 1;
});
