import type { QueryLogic } from "../data/types";
import { logger } from "../utils/logger";

export interface QueryWarnLogger {
  warn(obj: object, msg: string): void;
}

const PHRASE_CHARS = ["#", "@", "$", ":", "(", ")", "[", "]", "{", "}", '"', "'"];

export const needsQuoting = (keyword: string): boolean =>
  /\s/.test(keyword) || PHRASE_CHARS.some((c) => keyword.includes(c));

export const formatKeyword = (keyword: string): string =>
  needsQuoting(keyword) ? `"${keyword}"` : keyword;

/**
 * Builds an X recent-search query from keywords.
 *
 * Keywords with whitespace or search operators are quoted so the API matches them as
 * exact phrases. `AND` relies on the API's implicit conjunction; anything other than
 * `AND`/`OR` falls back to `OR` with a warning.
 */
export function buildQuery(
  keywords: readonly string[],
  logic: QueryLogic | (string & {}),
  log: QueryWarnLogger = logger
): string {
  if (keywords.length === 0) return "";

  const formatted = keywords.map(formatKeyword);
  if (logic === "AND") return formatted.join(" ");
  if (logic !== "OR") {
    log.warn({ logic }, "Unknown query logic, defaulting to OR");
  }
  return formatted.join(" OR ");
}
