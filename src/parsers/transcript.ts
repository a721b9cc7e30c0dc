import type {
  EntryType,
  LineContext,
  Message,
  ParseOutcome,
  RawEntry,
  ReadStats,
  Speaker,
} from "./types.js";
import { readJsonlLines } from "../utils/jsonl.js";
import { normalizeTimestamp } from "../utils/time.js";
import { UnreadableFileError } from "../errors.js";

const SPEAKERS: Record<EntryType, Speaker> = {
  user: "human",
  assistant: "assistant",
  tool_use: "tool",
  tool_result: "tool",
};

function isRecord(value: unknown): value is RawEntry {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEntryType(value: unknown): value is EntryType {
  return typeof value === "string" && Object.hasOwn(SPEAKERS, value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

interface ExtractedText {
  text: string;
  blockCounts: Record<string, number>;
}

/**
 * Flatten message content into plain text.
 *
 * Strings are used verbatim. Block arrays contribute their `text` blocks
 * (and bare string items) in order, joined by newlines; every other block
 * is only counted.
 */
export function extractTextContent(content: unknown): ExtractedText {
  const blockCounts: Record<string, number> = {};
  if (typeof content === "string") return { text: content, blockCounts };
  if (!Array.isArray(content)) return { text: "", blockCounts };

  const parts: string[] = [];
  for (const item of content) {
    if (typeof item === "string") {
      parts.push(item);
      continue;
    }
    if (!isRecord(item)) continue;
    if (item.type === "text") {
      if (typeof item.text === "string") parts.push(item.text);
      continue;
    }
    const blockType = typeof item.type === "string" ? item.type : "unknown";
    blockCounts[blockType] = (blockCounts[blockType] ?? 0) + 1;
  }
  return { text: parts.join("\n"), blockCounts };
}

function extractToolUseText(entry: RawEntry): string {
  const tool: RawEntry = isRecord(entry.tool) ? entry.tool : {};
  const name = nonEmptyString(tool.name) ?? "unknown";
  if (tool.input === undefined) return name;
  return `${name} ${JSON.stringify(tool.input)}`;
}

function extractToolResultText(entry: RawEntry): string {
  const result: RawEntry = isRecord(entry.result) ? entry.result : {};
  return [nonEmptyString(result.output), nonEmptyString(result.error)]
    .filter((part): part is string => part !== undefined)
    .join("\n");
}

function extractEntryText(type: EntryType, entry: RawEntry): ExtractedText {
  switch (type) {
    case "user":
    case "assistant": {
      const message = isRecord(entry.message) ? entry.message : undefined;
      return extractTextContent(message?.content ?? entry.content);
    }
    case "tool_use":
      return { text: extractToolUseText(entry), blockCounts: {} };
    case "tool_result":
      return { text: extractToolResultText(entry), blockCounts: {} };
  }
}

/** Normalize one decoded entry. Unknown types are skipped, not rejected. */
export function parseEntry(entry: unknown, context: LineContext): ParseOutcome {
  if (!isRecord(entry)) return { kind: "malformed", reason: "not-an-object" };
  const type = entry.type;
  if (!isEntryType(type)) return { kind: "skipped", reason: "unknown-type" };

  const timestamp = normalizeTimestamp(entry.timestamp);
  if (!timestamp) return { kind: "malformed", reason: "missing-timestamp" };

  const { text, blockCounts } = extractEntryText(type, entry);
  if (!text.trim()) return { kind: "skipped", reason: "empty" };

  return {
    kind: "message",
    message: {
      id: nonEmptyString(entry.uuid) ?? `${context.sessionId}:${context.lineNumber}`,
      sessionId: context.sessionId,
      speaker: SPEAKERS[type],
      timestamp,
      text,
      lineNumber: context.lineNumber,
      blockCounts,
      raw: entry,
    },
  };
}

/** Decode and normalize a single JSONL line. */
export function parseLine(line: string, context: LineContext): ParseOutcome {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return { kind: "malformed", reason: "invalid-json" };
  }
  return parseEntry(decoded, context);
}

export interface ReadMessagesOptions {
  sessionId: string;
  stats: ReadStats;
  signal?: AbortSignal;
}

/**
 * Stream the messages of one transcript in file order.
 *
 * Malformed lines and backwards timestamps are counted in `stats`; the
 * sequence is never reordered. Each call re-opens the file. Stops early,
 * without error, once `signal` is aborted.
 *
 * @throws UnreadableFileError if the file cannot be opened or read.
 */
export async function* readMessages(
  filePath: string,
  options: ReadMessagesOptions,
): AsyncGenerator<Message> {
  const { sessionId, stats, signal } = options;
  let previous: Date | undefined;

  try {
    for await (const { line, lineNumber } of readJsonlLines(filePath)) {
      if (signal?.aborted) return;
      const outcome = parseLine(line, { sessionId, lineNumber });
      if (outcome.kind === "malformed") {
        stats.malformedEntries++;
        continue;
      }
      if (outcome.kind === "skipped") continue;

      const { message } = outcome;
      if (previous && message.timestamp < previous) {
        stats.outOfOrderTimestamps++;
      }
      previous = message.timestamp;
      yield message;
    }
  } catch (err) {
    throw new UnreadableFileError(filePath, err);
  }
}
