import { describe, it, expect } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { extractTextContent, parseEntry, parseLine, readMessages } from "./transcript.js";
import { createReadStats, type Message } from "./types.js";
import { UnreadableFileError } from "../errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectsDir = join(__dirname, "..", "test-fixtures", "projects");
const authFile = join(projectsDir, "-home-dev-webapp", "session-auth.jsonl");
const toolsFile = join(projectsDir, "-home-dev-tools", "session-tools.jsonl");

const context = { sessionId: "session-x", lineNumber: 4 };

async function collect(gen: AsyncGenerator<Message>): Promise<Message[]> {
  const messages: Message[] = [];
  for await (const message of gen) messages.push(message);
  return messages;
}

describe("extractTextContent", () => {
  it("uses string content verbatim", () => {
    expect(extractTextContent("plain text")).toEqual({ text: "plain text", blockCounts: {} });
  });

  it("joins text blocks and counts the rest", () => {
    const result = extractTextContent([
      { type: "text", text: "first" },
      { type: "image", source: {} },
      "second",
      { type: "tool_use", name: "Read" },
      { type: "text", text: "third" },
      { type: "image", source: {} },
    ]);
    expect(result.text).toBe("first\nsecond\nthird");
    expect(result.blockCounts).toEqual({ image: 2, tool_use: 1 });
  });

  it("returns empty text for missing content", () => {
    expect(extractTextContent(undefined).text).toBe("");
    expect(extractTextContent({ text: "not an array" }).text).toBe("");
  });
});

describe("parseEntry", () => {
  it("maps user entries to the human speaker", () => {
    const outcome = parseEntry(
      {
        type: "user",
        uuid: "u-1",
        timestamp: "2025-03-01T10:00:00Z",
        message: { role: "user", content: "hello" },
      },
      context,
    );
    expect(outcome.kind).toBe("message");
    if (outcome.kind !== "message") return;
    expect(outcome.message.id).toBe("u-1");
    expect(outcome.message.speaker).toBe("human");
    expect(outcome.message.sessionId).toBe("session-x");
    expect(outcome.message.lineNumber).toBe(4);
    expect(outcome.message.timestamp.toISOString()).toBe("2025-03-01T10:00:00.000Z");
  });

  it("names the session after its file, not the entry's own field", () => {
    const outcome = parseEntry(
      {
        type: "user",
        uuid: "u-2",
        sessionId: "resumed-elsewhere",
        timestamp: "2025-03-01T10:00:00Z",
        message: { role: "user", content: "hello" },
      },
      context,
    );
    expect(outcome.kind === "message" && outcome.message.sessionId).toBe("session-x");
  });

  it("falls back to session and line for the id", () => {
    const outcome = parseEntry(
      { type: "assistant", timestamp: 1740823200, content: "top-level content" },
      context,
    );
    expect(outcome.kind).toBe("message");
    if (outcome.kind !== "message") return;
    expect(outcome.message.id).toBe("session-x:4");
    expect(outcome.message.text).toBe("top-level content");
    expect(outcome.message.timestamp.toISOString()).toBe("2025-03-01T10:00:00.000Z");
  });

  it("renders tool calls as name and JSON input", () => {
    const outcome = parseEntry(
      {
        type: "tool_use",
        timestamp: "2025-03-01T10:00:00Z",
        tool: { name: "Grep", input: { pattern: "todo" } },
      },
      context,
    );
    expect(outcome.kind === "message" && outcome.message.text).toBe('Grep {"pattern":"todo"}');
    expect(outcome.kind === "message" && outcome.message.speaker).toBe("tool");
  });

  it("joins tool output and error", () => {
    const outcome = parseEntry(
      {
        type: "tool_result",
        timestamp: "2025-03-01T10:00:00Z",
        result: { output: "3 files", error: "1 warning" },
      },
      context,
    );
    expect(outcome.kind === "message" && outcome.message.text).toBe("3 files\n1 warning");
  });

  it("skips unknown entry types", () => {
    expect(parseEntry({ type: "summary", summary: "x" }, context)).toEqual({
      kind: "skipped",
      reason: "unknown-type",
    });
    expect(parseEntry({ summary: "no type" }, context)).toEqual({
      kind: "skipped",
      reason: "unknown-type",
    });
  });

  it("skips entries without text", () => {
    expect(
      parseEntry(
        {
          type: "user",
          timestamp: "2025-03-01T10:00:00Z",
          message: { content: [{ type: "image" }] },
        },
        context,
      ),
    ).toEqual({ kind: "skipped", reason: "empty" });
    expect(
      parseEntry({ type: "user", timestamp: "2025-03-01T10:00:00Z", content: "   " }, context),
    ).toEqual({ kind: "skipped", reason: "empty" });
  });

  it("rejects entries without a usable timestamp", () => {
    expect(parseEntry({ type: "user", content: "hi" }, context)).toEqual({
      kind: "malformed",
      reason: "missing-timestamp",
    });
    expect(parseEntry({ type: "user", content: "hi", timestamp: "yesterday" }, context)).toEqual({
      kind: "malformed",
      reason: "missing-timestamp",
    });
  });

  it("rejects values that are not objects", () => {
    expect(parseEntry([1, 2], context)).toEqual({ kind: "malformed", reason: "not-an-object" });
    expect(parseEntry("text", context)).toEqual({ kind: "malformed", reason: "not-an-object" });
    expect(parseEntry(null, context)).toEqual({ kind: "malformed", reason: "not-an-object" });
  });
});

describe("parseLine", () => {
  it("reports undecodable lines as malformed", () => {
    expect(parseLine("{oops", context)).toEqual({ kind: "malformed", reason: "invalid-json" });
  });
});

describe("readMessages", () => {
  it("streams messages in file order", async () => {
    const stats = createReadStats();
    const messages = await collect(readMessages(authFile, { sessionId: "session-auth", stats }));

    expect(messages.map((m) => m.id)).toEqual(["a1", "a2", "a3", "a4"]);
    expect(messages.map((m) => m.speaker)).toEqual(["human", "assistant", "human", "assistant"]);
    expect(messages[1].text).toBe("I found the authentication bug.\nThe session token expires too early.");
    expect(messages[1].blockCounts).toEqual({ thinking: 1, tool_use: 1 });
    expect(stats).toEqual({ malformedEntries: 0, outOfOrderTimestamps: 0 });
  });

  it("counts malformed lines and backwards timestamps without reordering", async () => {
    const stats = createReadStats();
    const messages = await collect(readMessages(toolsFile, { sessionId: "session-tools", stats }));

    expect(messages.map((m) => m.id)).toEqual(["c1", "c2", "c3", "c5"]);
    expect(messages.map((m) => m.lineNumber)).toEqual([2, 3, 4, 6]);
    expect(messages[1].text).toBe('Bash {"command":"npm run build"}');
    expect(messages[2].text).toBe("build failed: missing module\nexit code 1");
    expect(stats).toEqual({ malformedEntries: 3, outOfOrderTimestamps: 1 });
  });

  it("yields nothing once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const messages = await collect(
      readMessages(authFile, {
        sessionId: "session-auth",
        stats: createReadStats(),
        signal: controller.signal,
      }),
    );
    expect(messages).toEqual([]);
  });

  it("wraps read failures in UnreadableFileError", async () => {
    const missing = join(projectsDir, "missing.jsonl");
    await expect(
      collect(readMessages(missing, { sessionId: "missing", stats: createReadStats() })),
    ).rejects.toBeInstanceOf(UnreadableFileError);
  });
});
