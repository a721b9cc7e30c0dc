/**
 * Thrown before any scanning when a search request cannot run.
 */
export class InvalidQueryError extends Error {
  readonly query: string;

  constructor(query: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid query "${query}": ${reason}`, options);
    this.name = "InvalidQueryError";
    this.query = query;
  }
}

/**
 * A transcript that could not be opened or read to the end.
 * The engine skips such files and counts them.
 */
export class UnreadableFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read transcript "${filePath}": ${reason}`, { cause });
    this.name = "UnreadableFileError";
    this.filePath = filePath;
  }
}

/** A date argument that does not parse. Never read as "no bound". */
export class InvalidDateError extends Error {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`Invalid ${field} "${value}": expected an ISO 8601 date`);
    this.name = "InvalidDateError";
    this.field = field;
    this.value = value;
  }
}
