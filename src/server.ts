import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SearchEngine } from "./search/engine.js";
import { SEARCH_MODES, type MatchStrategy, type SearchOutcome } from "./search/types.js";
import { DEFAULT_CONTEXT_SIZE, DEFAULT_MAX_RESULTS } from "./search/query.js";
import { tokenize, levenshteinDistance } from "./search/tokenizer.js";
import { TranscriptStore } from "./parsers/store.js";
import { InvalidDateError, InvalidQueryError } from "./errors.js";
import { resolveTranscriptsRoot } from "./utils/paths.js";
import { parseDateOption } from "./utils/time.js";

// Shared schema fragments
const dateFromSchema = z.string().optional().describe("ISO 8601 date; only messages at or after it are searched");
const dateToSchema = z.string().optional().describe("ISO 8601 date; only messages at or before it are searched");

/** Request errors the caller can fix; reported as tool errors, not protocol failures. */
function isRequestError(err: unknown): err is InvalidQueryError | InvalidDateError {
  return err instanceof InvalidQueryError || err instanceof InvalidDateError;
}

function textResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(message: string) {
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true,
  };
}

export interface ServerOptions {
  engine?: SearchEngine;
}

export async function createServerForRoot(
  root: string,
  options: ServerOptions = {},
): Promise<McpServer> {
  const server = new McpServer({
    name: "transcript-search",
    version: "0.1.0",
  });

  const engine = options.engine ?? new SearchEngine();
  const store = new TranscriptStore(root, engine.config.reservedDirs);

  // ── Tool 1: transcripts_search ──────────────────────────────────

  server.registerTool(
    "transcripts_search",
    {
      title: "Transcript Search",
      description:
        "Search conversation transcripts and return ranked matches with surrounding context. " +
        "Modes: 'smart' (word overlap with phrase and proximity bonuses, the default), " +
        "'exact' (substring), 'regex' (JavaScript regular expression) and 'semantic' " +
        "(vector similarity; falls back to smart when no model is configured, reported as " +
        "semanticDowngraded).",
      inputSchema: {
        query: z.string().describe("Search text, or a pattern in regex mode"),
        mode: z.enum(SEARCH_MODES).default("smart").describe("Matching strategy"),
        caseSensitive: z.boolean().default(false).describe("Match case exactly (default false)"),
        speaker: z
          .enum(["all", "human", "assistant"])
          .default("all")
          .describe("Only search messages from this speaker"),
        contextSize: z
          .number()
          .int()
          .min(0)
          .max(2000)
          .default(DEFAULT_CONTEXT_SIZE)
          .describe("Characters of context kept either side of the match"),
        maxResults: z
          .number()
          .int()
          .min(1)
          .max(100)
          .default(DEFAULT_MAX_RESULTS)
          .describe("Max results to return"),
        dateFrom: dateFromSchema,
        dateTo: dateToSchema,
      },
    },
    async ({ query, mode, caseSensitive, speaker, contextSize, maxResults, dateFrom, dateTo }) => {
      let outcome: SearchOutcome;
      try {
        outcome = await engine.search(root, {
          text: query,
          mode,
          caseSensitive,
          speakerFilter: speaker === "all" ? undefined : speaker,
          contextSize,
          maxResults,
          dateFrom: parseDateOption(dateFrom, "dateFrom"),
          dateTo: parseDateOption(dateTo, "dateTo"),
        });
      } catch (err) {
        if (isRequestError(err)) return errorResult(err.message);
        throw err;
      }

      return textResult({
        totalResults: outcome.results.length,
        semanticDowngraded: outcome.semanticDowngraded,
        filesScanned: outcome.filesScanned,
        skippedFiles: outcome.skippedFiles,
        malformedEntries: outcome.malformedEntries,
        skippedEntries: outcome.skippedEntries,
        results: outcome.results.map((r) => ({
          sessionId: r.sessionId,
          messageId: r.messageId,
          project: r.project,
          speaker: r.speaker,
          timestamp: r.timestamp.toISOString(),
          score: Math.round(r.score * 1000) / 1000,
          matchedText: r.matchedText,
          snippet: r.snippet,
          matchCount: r.matchCount,
        })),
      });
    },
  );

  // ── Tool 2: transcripts_sessions ────────────────────────────────

  server.registerTool(
    "transcripts_sessions",
    {
      title: "Transcript Sessions",
      description:
        "List conversation sessions, most recently active first. " +
        "Use this to browse activity or find a session to open with transcripts_read.",
      inputSchema: {
        project: z.string().optional().describe("Filter by project directory substring"),
        dateFrom: dateFromSchema,
        dateTo: dateToSchema,
        limit: z.number().int().min(1).max(200).default(30).describe("Max sessions to return"),
      },
    },
    async ({ project, dateFrom, dateTo, limit }) => {
      let bounds: { dateFrom?: Date; dateTo?: Date };
      try {
        bounds = {
          dateFrom: parseDateOption(dateFrom, "dateFrom"),
          dateTo: parseDateOption(dateTo, "dateTo"),
        };
      } catch (err) {
        if (isRequestError(err)) return errorResult(err.message);
        throw err;
      }
      const sessions = await store.listSessions({ project, ...bounds, limit });

      return textResult({
        totalSessions: sessions.length,
        sessions: sessions.map((s) => ({
          sessionId: s.sessionId,
          project: s.project,
          timestamp: s.timestamp.toISOString(),
          lastTimestamp: s.lastTimestamp.toISOString(),
          messageCount: s.messageCount,
          display: s.display,
        })),
      });
    },
  );

  // ── Tool 3: transcripts_read ────────────────────────────────────

  server.registerTool(
    "transcripts_read",
    {
      title: "Transcript Read",
      description:
        "Retrieve the messages of one session. Pass a query to centre the result on the " +
        "first matching message and contextWindow to include its neighbours. " +
        "Without a mode the query matches words, tolerating typos; with a mode it matches " +
        "exactly as transcripts_search does. Use offset/limit to paginate large sessions.",
      inputSchema: {
        sessionId: z.string().describe("Session ID from transcripts_search or transcripts_sessions"),
        query: z
          .string()
          .optional()
          .describe("Find the first message containing these words (typos tolerated)"),
        mode: z
          .enum(SEARCH_MODES)
          .optional()
          .describe("Locate the query with this search mode instead of word matching"),
        caseSensitive: z.boolean().optional().describe("Match case exactly when a mode is given"),
        contextWindow: z
          .number()
          .int()
          .min(0)
          .max(100)
          .optional()
          .describe("Messages to include before and after the matched message (requires query)"),
        offset: z.number().int().min(0).optional().describe("Start from this message index (0-based)"),
        limit: z.number().int().min(1).max(500).optional().describe("Max number of messages to return"),
      },
    },
    async ({ sessionId, query, mode, caseSensitive, contextWindow, offset, limit }) => {
      let strategy: MatchStrategy | undefined;
      if (query && mode) {
        try {
          strategy = await engine.matcher({ text: query, mode, caseSensitive });
        } catch (err) {
          if (isRequestError(err)) return errorResult(err.message);
          throw err;
        }
      }

      const session = await store.getSession(sessionId);
      if (!session) return errorResult(`Session "${sessionId}" not found.`);

      const allMessages = session.messages;
      const queryWords = query ? tokenize(query) : [];

      const matchesWords = (text: string): boolean => {
        if (queryWords.length === 0) return false;
        const msgTokens = tokenize(text);
        // Every query word must appear, exactly or within edit distance 2
        return queryWords.every((qw) =>
          msgTokens.some((mt) => {
            if (mt === qw) return true;
            if (Math.abs(mt.length - qw.length) > 2) return false;
            return levenshteinDistance(mt, qw) <= 2;
          }),
        );
      };

      const matchIndices: number[] = [];
      if (query) {
        for (const [i, m] of allMessages.entries()) {
          const matched = strategy ? (await strategy.match(m.text)) !== null : matchesWords(m.text);
          if (matched) matchIndices.push(i);
        }
      }

      let windowStart = 0;
      let messages = allMessages;
      const matchIndex = matchIndices.length > 0 ? matchIndices[0] : -1;

      if (matchIndex !== -1 && contextWindow !== undefined) {
        windowStart = Math.max(0, matchIndex - contextWindow);
        messages = allMessages.slice(windowStart, matchIndex + contextWindow + 1);
      }

      // Pagination applies after context window extraction
      if (offset !== undefined && offset > 0) {
        const skip = Math.min(offset, messages.length);
        windowStart += skip;
        messages = messages.slice(skip);
      }
      if (limit !== undefined) {
        messages = messages.slice(0, limit);
      }

      const output: Record<string, unknown> = {
        sessionId: session.sessionId,
        project: session.project,
        timestamp: session.timestamp.toISOString(),
        totalMessages: allMessages.length,
        returnedMessages: messages.length,
        malformedEntries: session.stats.malformedEntries,
        messages: messages.map((m, i) => ({
          index: windowStart + i,
          id: m.id,
          speaker: m.speaker,
          content: m.text,
          timestamp: m.timestamp.toISOString(),
          ...(windowStart + i === matchIndex ? { matched: true } : {}),
        })),
      };

      if (matchIndex !== -1) {
        output.matchedMessageIndex = matchIndex;
        output.allMatchIndices = matchIndices;
      } else if (query) {
        output.queryNotFound = true;
      }

      return textResult(output);
    },
  );

  return server;
}

export async function createServer(): Promise<McpServer> {
  const root = resolveTranscriptsRoot();
  console.error(`Searching transcripts under ${root}`);
  return createServerForRoot(root);
}
