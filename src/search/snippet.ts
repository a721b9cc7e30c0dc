import type { MatchSpan } from "./types.js";

/**
 * Window of `contextSize` characters either side of `span`, clipped to the
 * message text. The result never exceeds `2 * contextSize + (span.end - span.start)`
 * characters and always contains the matched slice.
 */
export function extractSnippet(text: string, span: MatchSpan, contextSize: number): string {
  const start = Math.max(0, span.start - contextSize);
  const end = Math.min(text.length, span.end + contextSize);
  return text.slice(start, end);
}
