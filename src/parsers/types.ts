export type Speaker = "human" | "assistant" | "tool";

export type EntryType = "user" | "assistant" | "tool_use" | "tool_result";

/** A decoded JSONL line that is an object. Fields are untrusted until narrowed. */
export type RawEntry = Record<string, unknown>;

export interface Message {
  id: string;
  sessionId: string;
  speaker: Speaker;
  timestamp: Date;
  text: string;
  /** 1-based line in the source file. */
  lineNumber: number;
  /** Non-text content blocks by type (images, tool calls, thinking). */
  blockCounts: Record<string, number>;
  raw: RawEntry;
}

export type ParseOutcome =
  | { kind: "message"; message: Message }
  | { kind: "skipped"; reason: "unknown-type" | "empty" }
  | { kind: "malformed"; reason: "invalid-json" | "not-an-object" | "missing-timestamp" };

export interface LineContext {
  sessionId: string;
  lineNumber: number;
}

/** Counters filled in while a transcript file is streamed. */
export interface ReadStats {
  malformedEntries: number;
  outOfOrderTimestamps: number;
}

export function createReadStats(): ReadStats {
  return { malformedEntries: 0, outOfOrderTimestamps: 0 };
}

export interface SessionSummary {
  sessionId: string;
  project: string;
  filePath: string;
  timestamp: Date;
  lastTimestamp: Date;
  messageCount: number;
  display?: string;
}

export interface SessionContent {
  sessionId: string;
  project: string;
  filePath: string;
  timestamp: Date;
  messages: Message[];
  stats: ReadStats;
}

export interface ListSessionsOptions {
  dateFrom?: Date;
  dateTo?: Date;
  project?: string;
  limit?: number;
}
