import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { LiveSearch, emptyOutcome, type LiveSearchOptions, type Searcher } from "./live.js";
import type { SearchOutcome } from "./types.js";
import { InvalidQueryError } from "../errors.js";

function outcomeFor(text: string): SearchOutcome {
  return { ...emptyOutcome(), filesScanned: text.length };
}

function createSearcher() {
  return vi.fn<Searcher["search"]>(async (_root, input, options) => {
    if (input.text === "(") throw new InvalidQueryError("(", "Unterminated group");
    if (input.text === "slow") {
      await new Promise<void>((resolve) => options?.signal?.addEventListener("abort", () => resolve()));
      return { ...emptyOutcome(), cancelled: true };
    }
    return outcomeFor(input.text);
  });
}

describe("LiveSearch", () => {
  let search: ReturnType<typeof createSearcher>;
  let onResults: Mock<LiveSearchOptions["onResults"]>;

  beforeEach(() => {
    vi.useFakeTimers();
    search = createSearcher();
    onResults = vi.fn<LiveSearchOptions["onResults"]>();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createLive(overrides: Partial<LiveSearchOptions> = {}): LiveSearch {
    return new LiveSearch({ searcher: { search }, root: "/transcripts", onResults, ...overrides });
  }

  it("searches only the last text typed within the debounce window", async () => {
    const live = createLive();
    live.update("b");
    live.update("bu");
    await vi.advanceTimersByTimeAsync(100);
    live.update("bug");
    await vi.advanceTimersByTimeAsync(149);
    expect(search).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await live.flush();
    expect(search).toHaveBeenCalledTimes(1);
    expect(search.mock.calls[0][1]).toEqual({ text: "bug" });
    expect(onResults).toHaveBeenCalledWith(outcomeFor("bug"), "bug");
  });

  it("aborts the search in flight when the text changes", async () => {
    const live = createLive();
    live.update("slow");
    await vi.advanceTimersByTimeAsync(150);
    expect(search).toHaveBeenCalledTimes(1);

    live.update("fast");
    expect(search.mock.calls[0][2]?.signal?.aborted).toBe(true);
    await vi.advanceTimersByTimeAsync(150);
    await live.flush();

    expect(onResults).toHaveBeenCalledTimes(1);
    expect(onResults).toHaveBeenCalledWith(outcomeFor("fast"), "fast");
  });

  it("passes the default options with every query", async () => {
    const live = createLive({ defaults: { mode: "exact", maxResults: 5 } });
    live.update("bug");
    await live.flush();
    expect(search.mock.calls[0][0]).toBe("/transcripts");
    expect(search.mock.calls[0][1]).toEqual({ mode: "exact", maxResults: 5, text: "bug" });
  });

  it("reports an empty outcome for blank text without searching", async () => {
    const live = createLive();
    live.update("  ");
    await live.flush();
    expect(search).not.toHaveBeenCalled();
    expect(onResults).toHaveBeenCalledWith(emptyOutcome(), "  ");
  });

  it("serves repeated queries from the cache", async () => {
    const live = createLive();
    live.update("bug");
    await live.flush();
    live.update("bug");
    await live.flush();
    expect(search).toHaveBeenCalledTimes(1);
    expect(onResults).toHaveBeenCalledTimes(2);
  });

  it("evicts the least recently used outcome", async () => {
    const live = createLive({ cacheSize: 1 });
    for (const text of ["a", "b", "a"]) {
      live.update(text);
      await live.flush();
    }
    expect(search).toHaveBeenCalledTimes(3);
  });

  it("hands search failures to onError", async () => {
    const onError = vi.fn<(error: unknown, text: string) => void>();
    const live = createLive({ onError });
    live.update("(");
    await live.flush();
    expect(onResults).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(InvalidQueryError);
    expect(onError.mock.calls[0][1]).toBe("(");
  });

  it("drops the pending query on cancel", async () => {
    const live = createLive();
    live.update("bug");
    live.cancel();
    await vi.advanceTimersByTimeAsync(500);
    expect(search).not.toHaveBeenCalled();
  });

  it("ignores updates after close", async () => {
    const live = createLive();
    live.close();
    live.update("bug");
    await vi.advanceTimersByTimeAsync(500);
    await live.flush();
    expect(search).not.toHaveBeenCalled();
    expect(onResults).not.toHaveBeenCalled();
  });
});
