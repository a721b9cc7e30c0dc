import { availableParallelism } from "os";
import { z } from "zod";
import type { SearchConfig } from "./types.js";
import { RESERVED_OUTPUT_DIRS } from "../utils/paths.js";

export const STOP_WORDS: readonly string[] = Object.freeze([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to",
  "for", "is", "are", "was", "were", "be", "been", "being", "have", "has",
  "had", "do", "does", "did", "will", "would", "could", "should", "may", "might",
  "i", "you", "we", "they", "it", "this", "that", "these", "those",
]);

export const DEFAULT_SEARCH_CONFIG: SearchConfig = Object.freeze({
  relevanceThreshold: 0.3,
  exactPhraseBonus: 0.5,
  proximityBonus: 0.2,
  proximityWindow: 10,
  exactMatchScore: 1,
  occurrenceStep: 0.01,
  occurrenceCap: 10,
  semanticThreshold: 0.3,
  concurrency: Math.max(1, availableParallelism()),
  reservedDirs: RESERVED_OUTPUT_DIRS,
  stopWords: STOP_WORDS,
});

const searchConfigSchema = z.object({
  relevanceThreshold: z.number().min(0),
  exactPhraseBonus: z.number().min(0),
  proximityBonus: z.number().min(0),
  proximityWindow: z.number().int().min(2),
  exactMatchScore: z.number().positive(),
  occurrenceStep: z.number().min(0),
  occurrenceCap: z.number().int().min(0),
  semanticThreshold: z.number().min(-1).max(1),
  concurrency: z.number().int().min(1),
  reservedDirs: z.array(z.string()).readonly(),
  stopWords: z.array(z.string()).readonly(),
});

/**
 * Merge overrides onto the defaults and validate the result.
 * The returned value is frozen; engines never share mutable settings.
 */
export function resolveSearchConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  const merged = searchConfigSchema.parse({ ...DEFAULT_SEARCH_CONFIG, ...overrides });
  return Object.freeze({
    ...merged,
    reservedDirs: Object.freeze([...merged.reservedDirs]),
    stopWords: Object.freeze(merged.stopWords.map((w) => w.toLowerCase())),
  });
}
