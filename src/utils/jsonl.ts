import { createReadStream } from "fs";
import { createInterface } from "readline";

export interface JsonlLine {
  line: string;
  /** 1-based, counting blank lines. */
  lineNumber: number;
}

/**
 * Stream a JSONL file line by line without buffering it whole.
 * Blank lines are skipped; parsing is left to the caller so that
 * malformed lines can be counted rather than dropped unseen.
 *
 * Open and read errors reject the iteration.
 */
export async function* readJsonlLines(filePath: string): AsyncGenerator<JsonlLine> {
  const rl = createInterface({
    input: createReadStream(filePath, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });
  let lineNumber = 0;
  try {
    for await (const line of rl) {
      lineNumber++;
      const trimmed = line.trim();
      if (!trimmed) continue;
      yield { line: trimmed, lineNumber };
    }
  } finally {
    rl.close();
  }
}
