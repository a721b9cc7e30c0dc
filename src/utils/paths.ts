import { homedir } from "os";
import { join, relative, sep } from "path";

/**
 * Directories written by the backup/export tools next to the transcripts.
 * They hold converted copies, so searching them would only return duplicates.
 */
export const RESERVED_OUTPUT_DIRS: readonly string[] = ["markdown", "html", "data", "json"];

export function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? join(homedir(), p.slice(1)) : p;
}

/**
 * Resolve the transcripts root, respecting env var overrides.
 *
 * - TRANSCRIPTS_ROOT  → used as-is (after ~ expansion)
 * - CLAUDE_CONFIG_DIR → `<dir>/projects`
 * - otherwise         → `~/.claude/projects`
 */
export function resolveTranscriptsRoot(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TRANSCRIPTS_ROOT) return expandHome(env.TRANSCRIPTS_ROOT);
  const configDir = env.CLAUDE_CONFIG_DIR || join(homedir(), ".claude");
  return join(expandHome(configDir), "projects");
}

/**
 * Project directories are named after the encoded working directory,
 * e.g. `-home-testuser-my-project`. Returns the first path segment under
 * `root`, or an empty string for files directly inside it.
 */
export function projectOf(root: string, filePath: string): string {
  const segments = relative(root, filePath).split(sep);
  return segments.length > 1 ? segments[0] : "";
}

/** Session id from a transcript file name: the name without `.jsonl`. */
export function sessionIdFromFile(fileName: string): string {
  return fileName.endsWith(".jsonl") ? fileName.slice(0, -".jsonl".length) : fileName;
}
