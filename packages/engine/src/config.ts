// packages/engine/src/config.ts
import { z } from "zod";

import { DEFAULT_EXPIRATION_MS } from "../../cache/src/cache-manager.js";
import type { LogLevel } from "./logger.js";
import { LOG_LEVELS } from "./logger.js";

export class BqlConfigError extends Error {
  readonly code = "BQL_CONFIG_ERROR";

  constructor(
    readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = "BqlConfigError";
  }
}

const FlagSchema = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((v) => v === "1" || v === "true" || v === "yes" || v === "on");

const LevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const EnvSchema = z.object({
  BQL_DB: z.string().min(1).optional(),
  BQL_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_EXPIRATION_MS),
  BQL_CACHE_DISABLED: FlagSchema.default("false"),
  BQL_LOG_LEVEL: LevelSchema.default("warn"),
});

export type BqlConfig = {
  db_path: string | null;
  cache_ttl_ms: number;
  cache_disabled: boolean;
  log_level: LogLevel;
};

// blank variables count as unset
function present(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const v = env[key]?.trim();
    if (v) out[key] = key === "BQL_DB" ? v : v.toLowerCase();
  }
  return out;
}

/** Reads BQL_* variables; CLI flags come in as `overrides`. Throws BqlConfigError naming the first bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<BqlConfig> = {}): BqlConfig {
  const parsed = EnvSchema.safeParse(present(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : "environment";
    throw new BqlConfigError(variable, issue?.message ?? "invalid value");
  }

  const v = parsed.data;
  return {
    db_path: overrides.db_path ?? v.BQL_DB ?? null,
    cache_ttl_ms: overrides.cache_ttl_ms ?? v.BQL_CACHE_TTL_MS,
    cache_disabled: overrides.cache_disabled ?? v.BQL_CACHE_DISABLED,
    log_level: overrides.log_level ?? v.BQL_LOG_LEVEL,
  };
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}
