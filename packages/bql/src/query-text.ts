// packages/bql/src/query-text.ts

/** BQL that selects exactly the given ids: "", `id = "x"` or `id in ("a", "b")`. */
export function buildIdQuery(ids: readonly string[]): string {
  if (ids.length === 0) return "";
  if (ids.length === 1) return `id = ${JSON.stringify(ids[0])}`;
  return `id in (${ids.map((id) => JSON.stringify(id)).join(", ")})`;
}

const INDICATORS = [" = ", " != ", " < ", " > ", " <= ", " >= ", " ~ ", " !~ "];
const SPACED_KEYWORDS = [" and ", " or ", " in ", " not ", " expand ", " depth "];

/**
 * Heuristic used by search boxes: does this input read as BQL rather than
 * free text? Keywords count only when surrounded by spaces.
 */
export function isBqlQuery(input: string): boolean {
  if (INDICATORS.some((op) => input.includes(op))) return true;

  const lower = input.toLowerCase();
  if (SPACED_KEYWORDS.some((kw) => lower.includes(kw))) return true;
  if (lower.includes("order by")) return true;

  return lower.trim().startsWith("expand ");
}
