import type { Speaker } from "../parsers/types.js";

export const SEARCH_MODES = ["smart", "exact", "regex", "semantic"] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

export const SPEAKER_FILTERS = ["human", "assistant"] as const;
export type SpeakerFilter = (typeof SPEAKER_FILTERS)[number];

/** A validated, frozen search request. Build one with `createSearchQuery`. */
export interface SearchQuery {
  readonly text: string;
  readonly mode: SearchMode;
  readonly caseSensitive: boolean;
  readonly speakerFilter?: SpeakerFilter;
  readonly contextSize: number;
  readonly maxResults: number;
  readonly dateFrom?: Date;
  readonly dateTo?: Date;
}

/** Caller-facing request shape; everything but `text` has a default. */
export interface SearchQueryInput {
  text: string;
  mode?: SearchMode;
  caseSensitive?: boolean;
  speakerFilter?: SpeakerFilter;
  contextSize?: number;
  maxResults?: number;
  dateFrom?: Date;
  dateTo?: Date;
}

export interface SearchResult {
  sessionId: string;
  messageId: string;
  score: number;
  snippet: string;
  matchedText: string;
  timestamp: Date;
  speaker: Speaker;
  filePath: string;
  project: string;
  matchCount: number;
}

export interface SearchOutcome {
  results: SearchResult[];
  /** Semantic mode was requested but no similarity model was available. */
  semanticDowngraded: boolean;
  filesScanned: number;
  skippedFiles: number;
  malformedEntries: number;
  /** Messages the strategy failed to score (a similarity model error, say). */
  skippedEntries: number;
  outOfOrderTimestamps: number;
  cancelled: boolean;
}

/** Character range `[start, end)` in a message's text. */
export interface MatchSpan {
  start: number;
  end: number;
}

export interface Match {
  score: number;
  span: MatchSpan;
  matchCount: number;
}

/** One matching rule, built once per search and applied to every candidate text. */
export interface MatchStrategy {
  readonly mode: SearchMode;
  match(text: string): Match | null | Promise<Match | null>;
}

/** Document-vector capability backing semantic mode. */
export interface SimilarityModel {
  embed(text: string): Promise<number[]>;
}

export interface SearchConfig {
  /** Smart-mode cutoff; scores strictly below it are discarded. */
  readonly relevanceThreshold: number;
  readonly exactPhraseBonus: number;
  readonly proximityBonus: number;
  /** Matched tokens must fit in fewer than this many tokens to earn the proximity bonus. */
  readonly proximityWindow: number;
  readonly exactMatchScore: number;
  /** Added per extra occurrence in exact/regex mode, up to `occurrenceCap` times. */
  readonly occurrenceStep: number;
  readonly occurrenceCap: number;
  readonly semanticThreshold: number;
  /** Files scanned in parallel. */
  readonly concurrency: number;
  readonly reservedDirs: readonly string[];
  /** Lowercase words left out of smart-mode overlap unless the query has nothing else. */
  readonly stopWords: readonly string[];
}

export interface SearchOptions {
  signal?: AbortSignal;
}
