import type { SearchOptions, SearchOutcome, SearchQueryInput } from "./types.js";

const DEFAULT_DEBOUNCE_MS = 150;
const DEFAULT_CACHE_SIZE = 50;

/** The part of `SearchEngine` that live search drives. */
export interface Searcher {
  search(root: string, input: SearchQueryInput, options?: SearchOptions): Promise<SearchOutcome>;
}

export interface LiveSearchOptions {
  searcher: Searcher;
  root: string;
  /** Applied to every query; only the text changes between updates. */
  defaults?: Omit<SearchQueryInput, "text">;
  debounceMs?: number;
  /** Outcomes kept per distinct query, least recently used evicted first. */
  cacheSize?: number;
  onResults: (outcome: SearchOutcome, text: string) => void;
  /** Invalid queries typed so far (an unfinished regex, say) land here. */
  onError?: (error: unknown, text: string) => void;
}

export function emptyOutcome(): SearchOutcome {
  return {
    results: [],
    semanticDowngraded: false,
    filesScanned: 0,
    skippedFiles: 0,
    malformedEntries: 0,
    skippedEntries: 0,
    outOfOrderTimestamps: 0,
    cancelled: false,
  };
}

/**
 * Type-ahead search: each `update` restarts a debounce timer and aborts the
 * search in flight, so only the latest text ever reports results.
 */
export class LiveSearch {
  private readonly options: LiveSearchOptions;
  private readonly debounceMs: number;
  private readonly cacheSize: number;
  private readonly cache = new Map<string, SearchOutcome>();
  private timer: NodeJS.Timeout | undefined;
  private controller: AbortController | undefined;
  private pendingText: string | undefined;
  private running: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: LiveSearchOptions) {
    this.options = options;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
  }

  update(text: string): void {
    if (this.closed) return;
    this.pendingText = text;
    this.controller?.abort();
    clearTimeout(this.timer);
    this.timer = setTimeout(() => this.startPending(), this.debounceMs);
  }

  /** Start any debounced query now and wait until it has reported. */
  async flush(): Promise<void> {
    clearTimeout(this.timer);
    this.timer = undefined;
    this.startPending();
    await this.running;
  }

  /** Drop the pending query and abort the one in flight. */
  cancel(): void {
    clearTimeout(this.timer);
    this.timer = undefined;
    this.pendingText = undefined;
    this.controller?.abort();
  }

  close(): void {
    this.cancel();
    this.closed = true;
    this.cache.clear();
  }

  private startPending(): void {
    const text = this.pendingText;
    if (text === undefined) return;
    this.pendingText = undefined;
    this.running = this.run(text).catch((err) => {
      console.error("Live search listener failed:", err);
    });
  }

  private async run(text: string): Promise<void> {
    const { searcher, root, defaults, onResults, onError } = this.options;
    if (!text.trim()) {
      onResults(emptyOutcome(), text);
      return;
    }

    const input: SearchQueryInput = { ...defaults, text };
    const key = JSON.stringify(input);
    const cached = this.cache.get(key);
    if (cached) {
      this.remember(key, cached);
      onResults(cached, text);
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    try {
      const outcome = await searcher.search(root, input, { signal: controller.signal });
      // Superseded by a newer update
      if (outcome.cancelled || controller.signal.aborted) return;
      this.remember(key, outcome);
      onResults(outcome, text);
    } catch (error) {
      if (controller.signal.aborted) return;
      if (onError) onError(error, text);
      else console.error(`Live search for "${text}" failed:`, error);
    } finally {
      if (this.controller === controller) this.controller = undefined;
    }
  }

  private remember(key: string, outcome: SearchOutcome): void {
    this.cache.delete(key);
    this.cache.set(key, outcome);
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}
