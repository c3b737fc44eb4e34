/**
 * Retrieval merger: fetches ranked snippets and folds them into the prompt context under a budget.
 *
 * A missing source, a failing source and a slow source all produce an empty list; retrieval
 * never fails an exchange.
 */

import type { IRetrievalSource, RetrievalSnippet } from "../adapters/retrieval";
import { RetrievalUnavailable, errorMessage } from "../errors";
import { logger } from "../logging";

const DEFAULT_TOP_K = 5;
const DEFAULT_TIMEOUT_MS = 5_000;
const SNIPPET_SEPARATOR = "\n\n";

export interface RetrievalMergerConfig {
  topK?: number;
  timeoutMs?: number;
}

export interface MergedRetrieval {
  /** Snippets that fit, in descending relevance. */
  included: RetrievalSnippet[];
  /** Lowest-relevance snippets cut by the budget. */
  dropped: RetrievalSnippet[];
  /** Rendered block for the prompt ("" when nothing fits). */
  text: string;
}

/** Render one snippet as it appears in the prompt. */
export function renderSnippet(snippet: RetrievalSnippet, position: number): string {
  return `[${position}] (${snippet.source}) ${snippet.text}`;
}

/** Descending by score; equal scores keep the source's order. */
export function rankSnippets(snippets: readonly RetrievalSnippet[]): RetrievalSnippet[] {
  return snippets
    .filter((s) => s.text.trim().length > 0 && Number.isFinite(s.score))
    .sort((a, b) => b.score - a.score);
}

export class RetrievalMerger {
  private readonly topK: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly source: IRetrievalSource | null,
    config: RetrievalMergerConfig = {}
  ) {
    this.topK = config.topK ?? DEFAULT_TOP_K;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Ranked snippets for the query, at most topK. Empty when retrieval is off or unavailable. */
  async fetch(query: string, topK: number = this.topK): Promise<RetrievalSnippet[]> {
    const q = query.trim();
    if (!this.source || !q || topK <= 0) return [];
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new RetrievalUnavailable(`retrieval timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs
    );
    try {
      const results = await raceAbort(this.source.search(q, topK, controller.signal), controller.signal);
      return rankSnippets(results).slice(0, topK);
    } catch (err) {
      const failure = err instanceof RetrievalUnavailable ? err : new RetrievalUnavailable(errorMessage(err), { cause: err });
      logger.warn(
        { event: "RETRIEVAL_UNAVAILABLE", source: this.source.name, err: failure.message },
        "Retrieval failed; continuing without retrieved context"
      );
      return [];
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Keep the longest prefix of the ranked list that fits budgetChars.
   * The first snippet that does not fit ends the merge, so cuts always start at the lowest relevance
   * and no snippet is ever split.
   */
  merge(snippets: readonly RetrievalSnippet[], budgetChars: number): MergedRetrieval {
    const ranked = rankSnippets(snippets);
    const included: RetrievalSnippet[] = [];
    const blocks: string[] = [];
    let used = 0;
    for (const snippet of ranked) {
      const block = renderSnippet(snippet, included.length + 1);
      const cost = block.length + (blocks.length > 0 ? SNIPPET_SEPARATOR.length : 0);
      if (used + cost > budgetChars) break;
      included.push(snippet);
      blocks.push(block);
      used += cost;
    }
    return {
      included,
      dropped: ranked.slice(included.length),
      text: blocks.join(SNIPPET_SEPARATOR),
    };
  }
}

function raceAbort<T>(p: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void =>
      reject(signal.reason instanceof Error ? signal.reason : new RetrievalUnavailable("retrieval aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}
