#!/usr/bin/env node
// packages/engine/src/cli/bql.ts
/* eslint-disable no-console */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import Database from "better-sqlite3";

import { BqlQueryError, errorMessage } from "../../../bql/src/errors.js";
import type { QueryStage } from "../../../bql/src/errors.js";
import { tokenize } from "../../../bql/src/lexer.js";
import { parse } from "../../../bql/src/parser.js";
import { compileQuery } from "../../../bql/src/sql-builder.js";
import { validate } from "../../../bql/src/validator.js";
import type { BqlConfig } from "../config.js";
import { isLogLevel, loadConfig } from "../config.js";
import { QueryExecutor } from "../executor.js";
import type { Issue } from "../issue.js";
import { createLogger } from "../logger.js";
import { ensureIssueTables } from "../schema.js";

export const CLI_VERSION = "bql 0.1.0";

export type CliIO = {
  out: (s: string) => void;
  err: (s: string) => void;
  env: NodeJS.ProcessEnv;
};

const processIO: CliIO = {
  out: (s) => process.stdout.write(s),
  err: (s) => process.stderr.write(s),
  env: process.env,
};

function usage(): string {
  return `bql - query an issue store with BQL

Usage:
  bql help
  bql version

  bql query <bql> [--db <path>] [--json] [--init] [--no-cache] [--log-level <level>]
  bql check <bql> [--json]
  bql tokens <bql>

Environment:
  BQL_DB              database path (overridden by --db)
  BQL_CACHE_TTL_MS    query and graph cache lifetime, 0 = no expiry (default 300000)
  BQL_CACHE_DISABLED  1/true to bypass the caches
  BQL_LOG_LEVEL       debug | info | warn | error | silent (default warn)

Examples:
  bql query 'type = bug and priority <= P1' --db ./issues.db
  bql query 'id = "bd-1" expand down depth *' --db ./issues.db --json
  bql check 'status = open order by updated desc'
  bql tokens 'created > -7d'
`;
}

// -------------------- arg helpers --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

// First argument after the command that is neither a flag nor a flag's value.
function positional(args: string[], valueFlags: string[]): string | null {
  for (let i = 1; i < args.length; i++) {
    const a = args[i];
    if (valueFlags.includes(a)) {
      i++;
      continue;
    }
    if (!a.startsWith("--")) return a;
  }
  return null;
}

function formatIssue(issue: Issue): string {
  return `${issue.id}  P${issue.priority}  ${issue.issue_type}  ${issue.status}  ${issue.title}`;
}

function staged<T>(stage: QueryStage, text: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    throw new BqlQueryError(stage, text, e);
  }
}

// -------------------- commands --------------------

async function cmdQuery(args: string[], io: CliIO): Promise<number> {
  const text = positional(args, ["--db", "--log-level"]);
  if (text === null) {
    io.err(`Missing query.\n\n${usage()}`);
    return 1;
  }

  const overrides: Partial<BqlConfig> = {};
  const dbFlag = getFlagValue(args, "--db");
  if (dbFlag) overrides.db_path = dbFlag;
  if (args.includes("--no-cache")) overrides.cache_disabled = true;

  const level = getFlagValue(args, "--log-level");
  if (level !== null) {
    if (!isLogLevel(level)) {
      io.err(`[bql] unknown log level: ${level}\n`);
      return 1;
    }
    overrides.log_level = level;
  }

  const config = loadConfig(io.env, overrides);
  if (!config.db_path) {
    io.err("[bql] no database: pass --db <path> or set BQL_DB\n");
    return 1;
  }

  const init = args.includes("--init");
  const db = new Database(config.db_path, { fileMustExist: !init });
  const executor = new QueryExecutor(db, {
    ttlMs: config.cache_ttl_ms,
    cacheDisabled: config.cache_disabled,
    logger: createLogger("[bql] ", config.log_level),
  });

  try {
    if (init) ensureIssueTables(db);
    const result = await executor.run(text);

    if (args.includes("--json")) {
      io.out(`${JSON.stringify(result.issues, null, 2)}\n`);
    } else {
      for (const issue of result.issues) io.out(`${formatIssue(issue)}\n`);
      io.out(`${result.issues.length} issue(s)\n`);
    }

    if (result.expansion?.truncated) {
      io.err(`[bql] expansion stopped after ${result.expansion.levels} levels; results are incomplete\n`);
    }
    return 0;
  } finally {
    executor.close();
    db.close();
  }
}

function cmdCheck(args: string[], io: CliIO): number {
  const text = positional(args, []);
  if (text === null) {
    io.err(`Missing query.\n\n${usage()}`);
    return 1;
  }

  const query = staged("parse", text, () => parse(text));
  staged("validate", text, () => validate(query));

  const compiled = compileQuery(query);
  if (args.includes("--json")) {
    io.out(`${JSON.stringify({ ...compiled, expand: query.expand }, null, 2)}\n`);
    return 0;
  }

  io.out(`WHERE    ${compiled.where || "(none)"}\n`);
  io.out(`ORDER BY ${compiled.order_by}\n`);
  io.out(`PARAMS   ${JSON.stringify(compiled.params)}\n`);
  if (query.expand) io.out(`EXPAND   ${query.expand.direction} depth ${query.expand.depth}\n`);
  return 0;
}

function cmdTokens(args: string[], io: CliIO): number {
  const text = positional(args, []);
  if (text === null) {
    io.err(`Missing query.\n\n${usage()}`);
    return 1;
  }

  for (const tok of tokenize(text)) {
    io.out(`${tok.pos}\t${tok.type}\t${JSON.stringify(tok.literal)}\n`);
  }
  return 0;
}

/** Runs the CLI and resolves to its exit code. `argv` is process.argv-shaped. */
export async function run(argv: string[] = process.argv, io: CliIO = processIO): Promise<number> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h") || args[0] === "help") {
    io.out(usage());
    return 0;
  }

  const cmd = args[0];

  try {
    switch (cmd) {
      case "version":
        io.out(`${CLI_VERSION}\n`);
        return 0;
      case "query":
        return await cmdQuery(args, io);
      case "check":
        return cmdCheck(args, io);
      case "tokens":
        return cmdTokens(args, io);
      default:
        io.err(`Unknown command: ${cmd}\n\n${usage()}`);
        return 1;
    }
  } catch (e) {
    io.err(`[bql] ${errorMessage(e)}\n`);
    return 1;
  }
}

function invokedDirectly(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  try {
    return realpathSync(argv1) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}
