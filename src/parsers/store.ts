import type {
  ListSessionsOptions,
  Message,
  SessionContent,
  SessionSummary,
} from "./types.js";
import { createReadStats } from "./types.js";
import { findTranscriptFiles, type TranscriptFile } from "./files.js";
import { readMessages } from "./transcript.js";
import { UnreadableFileError } from "../errors.js";
import { RESERVED_OUTPUT_DIRS, resolveTranscriptsRoot } from "../utils/paths.js";
import { isDisplayableMessage, toDisplayLine } from "../utils/display.js";

/**
 * Session-level access to a directory of transcripts: listing and
 * whole-session reads. Every call re-reads the files; nothing is cached.
 */
export class TranscriptStore {
  readonly root: string;
  private readonly reservedDirs: readonly string[];

  constructor(root?: string, reservedDirs: readonly string[] = RESERVED_OUTPUT_DIRS) {
    this.root = root ?? resolveTranscriptsRoot();
    this.reservedDirs = reservedDirs;
  }

  async listSessions(options?: ListSessionsOptions): Promise<SessionSummary[]> {
    const files = await findTranscriptFiles(this.root, { reservedDirs: this.reservedDirs });
    const projectFilter = options?.project?.toLowerCase();

    let sessions: SessionSummary[] = [];
    for (const file of files) {
      if (projectFilter && !file.project.toLowerCase().includes(projectFilter)) continue;

      const summary = await this.summarize(file);
      if (!summary) continue;
      // Keep sessions whose span overlaps the requested range
      if (options?.dateFrom && summary.lastTimestamp < options.dateFrom) continue;
      if (options?.dateTo && summary.timestamp > options.dateTo) continue;
      sessions.push(summary);
    }

    sessions.sort(
      (a, b) =>
        b.lastTimestamp.getTime() - a.lastTimestamp.getTime() ||
        (a.sessionId < b.sessionId ? -1 : a.sessionId > b.sessionId ? 1 : 0),
    );

    if (options?.limit) {
      sessions = sessions.slice(0, options.limit);
    }
    return sessions;
  }

  async getSession(sessionId: string): Promise<SessionContent | null> {
    const file = await this.findSessionFile(sessionId);
    if (!file) return null;

    const stats = createReadStats();
    const messages: Message[] = [];
    for await (const message of readMessages(file.path, { sessionId, stats })) {
      messages.push(message);
    }
    if (messages.length === 0) return null;

    return {
      sessionId,
      project: file.project,
      filePath: file.path,
      timestamp: messages[0].timestamp,
      messages,
      stats,
    };
  }

  private async summarize(file: TranscriptFile): Promise<SessionSummary | null> {
    const stats = createReadStats();
    let first: Date | undefined;
    let last: Date | undefined;
    let messageCount = 0;
    let display: string | undefined;

    try {
      for await (const message of readMessages(file.path, { sessionId: file.sessionId, stats })) {
        messageCount++;
        first ??= message.timestamp;
        if (!last || message.timestamp > last) last = message.timestamp;
        if (!display && message.speaker === "human" && isDisplayableMessage(message.text)) {
          display = toDisplayLine(message.text);
        }
      }
    } catch (err) {
      if (!(err instanceof UnreadableFileError)) throw err;
      console.error(`Skipping session ${file.sessionId}: ${err.message}`);
      return null;
    }

    if (!first || !last) return null;
    return {
      sessionId: file.sessionId,
      project: file.project,
      filePath: file.path,
      timestamp: first,
      lastTimestamp: last,
      messageCount,
      display,
    };
  }

  private async findSessionFile(sessionId: string): Promise<TranscriptFile | null> {
    const files = await findTranscriptFiles(this.root, { reservedDirs: this.reservedDirs });
    return files.find((f) => f.sessionId === sessionId) ?? null;
  }
}
