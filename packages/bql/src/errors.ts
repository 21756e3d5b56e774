// packages/bql/src/errors.ts

export class BqlParseError extends Error {
  readonly code = "BQL_PARSE_ERROR";

  constructor(
    message: string,
    readonly position: number,
    readonly found: string
  ) {
    super(message);
    this.name = "BqlParseError";
  }
}

export class BqlValidationError extends Error {
  readonly code = "BQL_VALIDATION_ERROR";

  constructor(
    message: string,
    readonly field: string,
    readonly input: string
  ) {
    super(message);
    this.name = "BqlValidationError";
  }
}

/** A store call failed; `stage` names the step that issued it. */
export class BqlExecutionError extends Error {
  readonly code = "BQL_EXECUTION_ERROR";

  constructor(
    readonly stage: string,
    cause: unknown
  ) {
    super(`${stage}: ${errorMessage(cause)}`, { cause });
    this.name = "BqlExecutionError";
  }
}

export type QueryStage = "parse" | "validate" | "execute";

const STAGE_PREFIX: Record<QueryStage, string> = {
  parse: "parse error",
  validate: "validation error",
  execute: "execution error",
};

/** What `QueryExecutor.execute` rejects with: the failing stage plus the underlying error. */
export class BqlQueryError extends Error {
  readonly code = "BQL_QUERY_ERROR";

  constructor(
    readonly stage: QueryStage,
    readonly query: string,
    cause: unknown
  ) {
    super(`${STAGE_PREFIX[stage]}: ${errorMessage(cause)}`, { cause });
    this.name = "BqlQueryError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
