import type {
  Match,
  MatchStrategy,
  SearchConfig,
  SearchOptions,
  SearchOutcome,
  SearchQuery,
  SearchQueryInput,
  SearchResult,
  SimilarityModel,
} from "./types.js";
import { createSearchQuery } from "./query.js";
import { resolveSearchConfig } from "./config.js";
import { selectStrategy } from "./strategies.js";
import { extractSnippet } from "./snippet.js";
import { mapWithConcurrency } from "./pool.js";
import { findTranscriptFiles, type TranscriptFile } from "../parsers/files.js";
import { readMessages } from "../parsers/transcript.js";
import { createReadStats, type ReadStats } from "../parsers/types.js";
import { UnreadableFileError } from "../errors.js";
import { isInDateRange } from "../utils/time.js";

export interface SearchEngineOptions {
  config?: Partial<SearchConfig>;
  /** Enables semantic mode. Without it, semantic requests fall back to smart matching. */
  similarityModel?: SimilarityModel;
}

interface FileScan {
  results: SearchResult[];
  stats: ReadStats;
  skippedEntries: number;
  unreadable: boolean;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over results: score descending, then timestamp, session id,
 * message id and file path ascending. Independent of scan order.
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  return (
    b.score - a.score ||
    a.timestamp.getTime() - b.timestamp.getTime() ||
    compareStrings(a.sessionId, b.sessionId) ||
    compareStrings(a.messageId, b.messageId) ||
    compareStrings(a.filePath, b.filePath)
  );
}

/**
 * Streaming search over a directory of transcripts.
 *
 * Every call re-reads the files: there is no index and no cache. Files are
 * scanned on a bounded pool; all matches are pooled, sorted globally and
 * only then cut to `maxResults`.
 */
export class SearchEngine {
  readonly config: SearchConfig;
  private readonly similarityModel?: SimilarityModel;

  constructor(options: SearchEngineOptions = {}) {
    this.config = resolveSearchConfig(options.config);
    this.similarityModel = options.similarityModel;
  }

  /**
   * @throws InvalidQueryError before any file is opened if the request is invalid.
   */
  async search(
    root: string,
    input: SearchQueryInput,
    options: SearchOptions = {},
  ): Promise<SearchOutcome> {
    const query = createSearchQuery(input);
    const { signal } = options;
    const { strategy, semanticDowngraded } = await selectStrategy(
      query,
      this.config,
      this.similarityModel,
    );

    const outcome: SearchOutcome = {
      results: [],
      semanticDowngraded,
      filesScanned: 0,
      skippedFiles: 0,
      malformedEntries: 0,
      skippedEntries: 0,
      outOfOrderTimestamps: 0,
      cancelled: false,
    };
    if (signal?.aborted) return { ...outcome, cancelled: true };

    const startTime = Date.now();
    const files = await findTranscriptFiles(root, {
      reservedDirs: this.config.reservedDirs,
      signal,
    });

    const scans = await mapWithConcurrency(
      files,
      this.config.concurrency,
      (file) => this.scanFile(file, query, strategy, signal),
      signal,
    );

    if (signal?.aborted) return { ...outcome, cancelled: true };

    const pool: SearchResult[] = [];
    for (const scan of scans) {
      if (!scan) continue;
      outcome.malformedEntries += scan.stats.malformedEntries;
      outcome.outOfOrderTimestamps += scan.stats.outOfOrderTimestamps;
      outcome.skippedEntries += scan.skippedEntries;
      if (scan.unreadable) {
        outcome.skippedFiles++;
        continue;
      }
      outcome.filesScanned++;
      for (const result of scan.results) pool.push(result);
    }

    pool.sort(compareResults);
    outcome.results = pool.slice(0, query.maxResults);

    console.error(
      `Searched ${outcome.filesScanned} transcripts (${query.mode}) in ${Date.now() - startTime}ms: ` +
        `${pool.length} matches, ${outcome.skippedFiles} unreadable, ` +
        `${outcome.malformedEntries} malformed entries, ${outcome.skippedEntries} unscored`,
    );
    return outcome;
  }

  /**
   * The strategy a search for `input` applies to each message, so callers
   * can test single texts the same way.
   *
   * @throws InvalidQueryError if the request is invalid.
   */
  async matcher(input: SearchQueryInput): Promise<MatchStrategy> {
    const query = createSearchQuery(input);
    const { strategy } = await selectStrategy(query, this.config, this.similarityModel);
    return strategy;
  }

  private async scanFile(
    file: TranscriptFile,
    query: SearchQuery,
    strategy: MatchStrategy,
    signal?: AbortSignal,
  ): Promise<FileScan> {
    const stats = createReadStats();
    const results: SearchResult[] = [];
    let skippedEntries = 0;

    try {
      for await (const message of readMessages(file.path, {
        sessionId: file.sessionId,
        stats,
        signal,
      })) {
        // Filtered messages are never scored
        if (query.speakerFilter && message.speaker !== query.speakerFilter) continue;
        if (!isInDateRange(message.timestamp, query.dateFrom, query.dateTo)) continue;

        let match: Match | null;
        try {
          match = await strategy.match(message.text);
        } catch (err) {
          // One message the strategy cannot score never fails the search
          if (skippedEntries++ === 0) {
            const reason = err instanceof Error ? err.message : String(err);
            console.error(`Could not score message ${message.id} in ${file.path}: ${reason}`);
          }
          continue;
        }
        if (!match) continue;

        results.push({
          sessionId: message.sessionId,
          messageId: message.id,
          score: match.score,
          snippet: extractSnippet(message.text, match.span, query.contextSize),
          matchedText: message.text.slice(match.span.start, match.span.end),
          timestamp: message.timestamp,
          speaker: message.speaker,
          filePath: file.path,
          project: file.project,
          matchCount: match.matchCount,
        });
      }
    } catch (err) {
      if (!(err instanceof UnreadableFileError)) throw err;
      console.error(`Skipping file: ${err.message}`);
      return { results: [], stats, skippedEntries, unreadable: true };
    }

    return { results, stats, skippedEntries, unreadable: false };
  }
}
