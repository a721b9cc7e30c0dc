import type {
  Match,
  MatchSpan,
  MatchStrategy,
  SearchConfig,
  SearchMode,
  SearchQuery,
  SimilarityModel,
} from "./types.js";
import { escapeRegExp, regexFlags } from "./query.js";
import { tokenizeWithOffsets, type Token } from "./tokenizer.js";
import { cosineSimilarity } from "./similarity.js";

/** Occurrences past this count add nothing to a score, so scanning stops there. */
const MAX_MATCH_POSITIONS = 100;

/** Upper bound on the fallback span used when a semantic hit shares no words with the query. */
const LEADING_SPAN_CHARS = 100;

interface Occurrences {
  first: MatchSpan | null;
  count: number;
}

/** Non-empty matches of a global pattern; empty matches are stepped over. */
function scanPattern(pattern: RegExp, text: string): Occurrences {
  pattern.lastIndex = 0;
  let first: MatchSpan | null = null;
  let count = 0;
  let m: RegExpExecArray | null;
  while (count < MAX_MATCH_POSITIONS && (m = pattern.exec(text)) !== null) {
    if (m[0].length === 0) {
      pattern.lastIndex++;
      continue;
    }
    first ??= { start: m.index, end: m.index + m[0].length };
    count++;
  }
  return { first, count };
}

/**
 * Exact and regex modes: a message matches when the pattern occurs at
 * least once. Extra occurrences raise the score by a small step, enough to
 * order matches within the mode and no more.
 */
export class PatternStrategy implements MatchStrategy {
  readonly mode: SearchMode;
  private readonly pattern: RegExp;
  private readonly config: SearchConfig;

  constructor(mode: "exact" | "regex", pattern: RegExp, config: SearchConfig) {
    this.mode = mode;
    this.pattern = pattern;
    this.config = config;
  }

  match(text: string): Match | null {
    const { first, count } = scanPattern(this.pattern, text);
    if (!first) return null;
    const extra = Math.min(count - 1, this.config.occurrenceCap);
    return {
      score: this.config.exactMatchScore + extra * this.config.occurrenceStep,
      span: first,
      matchCount: count,
    };
  }
}

interface TokenWindow {
  span: MatchSpan;
  /** Number of tokens from the first to the last token in the window, inclusive. */
  length: number;
}

/**
 * Smallest run of text tokens holding at least one occurrence of every
 * token in `wanted`. Standard two-pointer sweep over the wanted positions.
 */
function smallestWindow(tokens: Token[], wanted: Set<string>): TokenWindow | null {
  const hits: { value: string; index: number; start: number; end: number }[] = [];
  tokens.forEach((t, index) => {
    if (wanted.has(t.value)) hits.push({ ...t, index });
  });

  const counts = new Map<string, number>();
  let covered = 0;
  let best: TokenWindow | null = null;
  let left = 0;

  for (let right = 0; right < hits.length; right++) {
    const added = (counts.get(hits[right].value) ?? 0) + 1;
    counts.set(hits[right].value, added);
    if (added === 1) covered++;

    while (covered === wanted.size) {
      const length = hits[right].index - hits[left].index + 1;
      if (!best || length < best.length) {
        best = { span: { start: hits[left].start, end: hits[right].end }, length };
      }
      const remaining = (counts.get(hits[left].value) ?? 0) - 1;
      counts.set(hits[left].value, remaining);
      if (remaining === 0) covered--;
      left++;
    }
  }
  return best;
}

export interface SmartEvaluation {
  score: number;
  overlap: number;
  phraseFound: boolean;
  proximity: boolean;
  matchedTokens: Set<string>;
  span: MatchSpan | null;
  matchCount: number;
}

/**
 * Lexical relevance: share of query words present, plus a bonus when the
 * whole query appears verbatim and another when the matched words sit
 * close together.
 */
export class SmartStrategy implements MatchStrategy {
  readonly mode: SearchMode = "smart";
  private readonly queryTokens: Set<string>;
  private readonly phrase: RegExp;
  private readonly caseSensitive: boolean;
  private readonly config: SearchConfig;

  constructor(query: SearchQuery, config: SearchConfig) {
    this.caseSensitive = query.caseSensitive;
    this.config = config;
    const tokens = new Set(tokenizeWithOffsets(query.text, query.caseSensitive).map((t) => t.value));
    const stopWords = new Set(config.stopWords);
    const content = [...tokens].filter((t) => !stopWords.has(t.toLowerCase()));
    // A query made only of stop words keeps them
    this.queryTokens = content.length > 0 ? new Set(content) : tokens;
    this.phrase = new RegExp(escapeRegExp(query.text.trim()), regexFlags(query.caseSensitive));
  }

  evaluate(text: string): SmartEvaluation {
    const tokens = tokenizeWithOffsets(text, this.caseSensitive);
    const matchedTokens = new Set<string>();
    let firstHit: Token | undefined;
    let tokenHits = 0;
    for (const token of tokens) {
      if (!this.queryTokens.has(token.value)) continue;
      matchedTokens.add(token.value);
      firstHit ??= token;
      tokenHits++;
    }

    const overlap = this.queryTokens.size > 0 ? matchedTokens.size / this.queryTokens.size : 0;
    const phrase = scanPattern(this.phrase, text);
    const window = matchedTokens.size >= 2 ? smallestWindow(tokens, matchedTokens) : null;
    const proximity = window !== null && window.length < this.config.proximityWindow;

    let score = overlap;
    if (phrase.first) score += this.config.exactPhraseBonus;
    if (proximity) score += this.config.proximityBonus;

    let span: MatchSpan | null = null;
    if (phrase.first) span = phrase.first;
    else if (proximity && window) span = window.span;
    else if (firstHit) span = { start: firstHit.start, end: firstHit.end };

    return {
      score,
      overlap,
      phraseFound: phrase.first !== null,
      proximity,
      matchedTokens,
      span,
      matchCount: phrase.first ? phrase.count : tokenHits,
    };
  }

  match(text: string): Match | null {
    const evaluation = this.evaluate(text);
    if (!evaluation.span || evaluation.score < this.config.relevanceThreshold) return null;
    return { score: evaluation.score, span: evaluation.span, matchCount: evaluation.matchCount };
  }
}

/** First sentence, or the first `LEADING_SPAN_CHARS` characters if longer. */
function leadingSpan(text: string): MatchSpan {
  const boundary = text.search(/[.!?\n]/);
  const end = boundary === -1 ? text.length : boundary + 1;
  return { start: 0, end: Math.max(1, Math.min(end, LEADING_SPAN_CHARS, text.length)) };
}

/**
 * Vector similarity between the query and each message. The span shown
 * is taken from lexical evidence when there is any.
 */
export class SemanticStrategy implements MatchStrategy {
  readonly mode: SearchMode = "semantic";
  private readonly model: SimilarityModel;
  private readonly queryVector: number[];
  private readonly threshold: number;
  private readonly locator: SmartStrategy;

  constructor(
    model: SimilarityModel,
    queryVector: number[],
    threshold: number,
    locator: SmartStrategy,
  ) {
    this.model = model;
    this.queryVector = queryVector;
    this.threshold = threshold;
    this.locator = locator;
  }

  async match(text: string): Promise<Match | null> {
    const score = cosineSimilarity(this.queryVector, await this.model.embed(text));
    if (Number.isNaN(score) || score < this.threshold) return null;
    const located = this.locator.evaluate(text);
    return {
      score,
      span: located.span ?? leadingSpan(text),
      matchCount: located.matchCount,
    };
  }
}

export interface StrategySelection {
  strategy: MatchStrategy;
  /** True when semantic mode fell back to smart matching. */
  semanticDowngraded: boolean;
}

/**
 * Build the strategy for `query.mode` once per search. Semantic mode
 * without a usable model falls back to smart matching instead of failing.
 */
export async function selectStrategy(
  query: SearchQuery,
  config: SearchConfig,
  model?: SimilarityModel,
): Promise<StrategySelection> {
  const flags = regexFlags(query.caseSensitive);
  switch (query.mode) {
    case "exact":
      return {
        strategy: new PatternStrategy("exact", new RegExp(escapeRegExp(query.text), flags), config),
        semanticDowngraded: false,
      };
    case "regex":
      return {
        strategy: new PatternStrategy("regex", new RegExp(query.text, flags), config),
        semanticDowngraded: false,
      };
    case "smart":
      return { strategy: new SmartStrategy(query, config), semanticDowngraded: false };
    case "semantic": {
      const smart = new SmartStrategy(query, config);
      if (!model) return { strategy: smart, semanticDowngraded: true };
      let queryVector: number[];
      try {
        queryVector = await model.embed(query.text);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`Similarity model failed, using smart matching: ${reason}`);
        return { strategy: smart, semanticDowngraded: true };
      }
      return {
        strategy: new SemanticStrategy(model, queryVector, config.semanticThreshold, smart),
        semanticDowngraded: false,
      };
    }
  }
}
