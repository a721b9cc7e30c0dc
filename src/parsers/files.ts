import { readdir, stat } from "fs/promises";
import { join } from "path";
import { RESERVED_OUTPUT_DIRS, projectOf, sessionIdFromFile } from "../utils/paths.js";

export interface TranscriptFile {
  path: string;
  sessionId: string;
  project: string;
}

export interface FindTranscriptFilesOptions {
  /** Directory names never descended into, at any depth. */
  reservedDirs?: readonly string[];
  signal?: AbortSignal;
}

/**
 * Recursively collect `*.jsonl` transcripts under `root`, sorted by path.
 * A missing root yields an empty list; unreadable subdirectories are skipped.
 */
export async function findTranscriptFiles(
  root: string,
  options: FindTranscriptFilesOptions = {},
): Promise<TranscriptFile[]> {
  const reserved = new Set(options.reservedDirs ?? RESERVED_OUTPUT_DIRS);
  const files: TranscriptFile[] = [];

  async function walk(dir: string): Promise<void> {
    if (options.signal?.aborted) return;
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      return; // missing root or unreadable directory
    }

    for (const entry of entries) {
      const entryPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (reserved.has(entry.name) || entry.name.startsWith(".")) continue;
        await walk(entryPath);
        continue;
      }
      if (!entry.name.endsWith(".jsonl")) continue;

      let fileStat;
      try {
        fileStat = await stat(entryPath);
      } catch {
        continue; // dangling symlink or removed mid-walk
      }
      if (!fileStat.isFile()) continue;

      files.push({
        path: entryPath,
        sessionId: sessionIdFromFile(entry.name),
        project: projectOf(root, entryPath),
      });
    }
  }

  await walk(root);
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
