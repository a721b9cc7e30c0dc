import { z } from "zod";
import { SEARCH_MODES, SPEAKER_FILTERS, type SearchQuery, type SearchQueryInput } from "./types.js";
import { InvalidQueryError } from "../errors.js";

export const DEFAULT_CONTEXT_SIZE = 150;
export const DEFAULT_MAX_RESULTS = 20;

const searchQuerySchema = z
  .object({
    text: z.string().refine((t) => t.trim().length > 0, "query text must not be empty"),
    mode: z.enum(SEARCH_MODES).default("smart"),
    caseSensitive: z.boolean().default(false),
    speakerFilter: z.enum(SPEAKER_FILTERS).optional(),
    contextSize: z.number().int().min(0).default(DEFAULT_CONTEXT_SIZE),
    maxResults: z.number().int().min(1, "must be at least 1").default(DEFAULT_MAX_RESULTS),
    dateFrom: z.date().optional(),
    dateTo: z.date().optional(),
  })
  .refine((q) => !q.dateFrom || !q.dateTo || q.dateFrom <= q.dateTo, {
    message: "dateFrom must not be after dateTo",
  });

/** `g` for scanning every occurrence; `i` unless the search is case-sensitive. */
export function regexFlags(caseSensitive: boolean): string {
  return caseSensitive ? "g" : "gi";
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Validate a request and freeze it.
 *
 * @throws InvalidQueryError for empty text, out-of-range numbers, an
 * inverted date range, or (in regex mode) a pattern that does not compile.
 */
export function createSearchQuery(input: SearchQueryInput): SearchQuery {
  const parsed = searchQuerySchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new InvalidQueryError(input.text, field ? `${field}: ${issue.message}` : issue.message);
  }

  const query = parsed.data;
  if (query.mode === "regex") {
    try {
      new RegExp(query.text, regexFlags(query.caseSensitive));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidQueryError(query.text, reason, { cause: err });
    }
  }

  return Object.freeze(query);
}
