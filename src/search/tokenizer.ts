/**
 * Shared tokenizer and string-distance utilities. The search strategies
 * and the MCP read tool both split text here, so "search" and "read"
 * agree on what a word is.
 */

/** A word is a maximal run of Unicode letters and digits; everything else separates. */
const WORD_RE = /[\p{L}\p{N}]+/gu;

export interface Token {
  /** Case-folded unless tokenized case-sensitively. */
  value: string;
  start: number;
  end: number;
}

/** Tokens with their character offsets in the original `text`. */
export function tokenizeWithOffsets(text: string, caseSensitive = false): Token[] {
  const tokens: Token[] = [];
  for (const m of text.matchAll(WORD_RE)) {
    const start = m.index ?? 0;
    tokens.push({
      value: caseSensitive ? m[0] : m[0].toLowerCase(),
      start,
      end: start + m[0].length,
    });
  }
  return tokens;
}

/** Word tokens of `text`, lowercased unless `caseSensitive`. */
export function tokenize(text: string, caseSensitive = false): string[] {
  return tokenizeWithOffsets(text, caseSensitive).map((t) => t.value);
}

/** Classic Levenshtein edit-distance (single-row DP). */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[] = Array.from({ length: n + 1 }, (_, i) => i);
  for (let i = 1; i <= m; i++) {
    let prev = dp[0];
    dp[0] = i;
    for (let j = 1; j <= n; j++) {
      const temp = dp[j];
      dp[j] = a[i - 1] === b[j - 1] ? prev : 1 + Math.min(prev, dp[j], dp[j - 1]);
      prev = temp;
    }
  }
  return dp[n];
}
