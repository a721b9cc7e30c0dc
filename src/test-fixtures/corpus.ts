import { mkdir, readdir, stat, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { findTranscriptFiles } from "../parsers/files.js";
import { readMessages } from "../parsers/transcript.js";
import { createReadStats, type Message } from "../parsers/types.js";

export interface EntrySpec {
  uuid: string;
  timestamp: string;
  text: string;
  type?: "user" | "assistant";
}

/** Write a transcript of plain-text messages to `root/relativePath`. */
export async function writeTranscript(
  root: string,
  relativePath: string,
  entries: EntrySpec[],
): Promise<string> {
  const filePath = join(root, relativePath);
  await mkdir(dirname(filePath), { recursive: true });
  const lines = entries.map((e) => {
    const type = e.type ?? "user";
    return JSON.stringify({
      type,
      uuid: e.uuid,
      timestamp: e.timestamp,
      message: { role: type, content: e.text },
    });
  });
  await writeFile(filePath, lines.join("\n") + "\n");
  return filePath;
}

/** Every message the engine would consider, in path then file order. */
export async function collectMessages(root: string): Promise<Message[]> {
  const messages: Message[] = [];
  for (const file of await findTranscriptFiles(root)) {
    const stats = createReadStats();
    for await (const message of readMessages(file.path, { sessionId: file.sessionId, stats })) {
      messages.push(message);
    }
  }
  return messages;
}

/** Path → size and mtime for every entry under `root`. */
export async function snapshotTree(root: string): Promise<Map<string, string>> {
  const snapshot = new Map<string, string>();
  async function walk(dir: string): Promise<void> {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const entryPath = join(dir, entry.name);
      const info = await stat(entryPath);
      snapshot.set(entryPath, `${info.size}:${info.mtimeMs}`);
      if (entry.isDirectory()) await walk(entryPath);
    }
  }
  await walk(root);
  return snapshot;
}
