/**
 * Memory optimizer: fold the turns after the coverage boundary into a bounded rolling summary.
 *
 * The previous summary is part of the compaction input, so each new summary covers everything the
 * old one did plus the newly folded turns. A pass that has nothing new to fold makes no provider
 * call; a failed pass leaves the stored summary untouched.
 */

import type { ILLM, ProviderRequest, ProviderResponse } from "../adapters/llm";
import { Deadline } from "../adapters/llm";
import { OptimizationFailed, errorMessage } from "../errors";
import { logger, logLlmCall } from "../logging";
import { recordSafely, type IRequestLogger, type RequestOutcome } from "../logging/request-log";
import type { ISessionStore, MemorySummary, SessionSnapshot, Turn } from "./types";

const DEFAULT_THRESHOLD = 40;
const SUMMARY_MAX_CHARS = 2_000;
const SUMMARY_MAX_TOKENS = 600;
const DEFAULT_TIMEOUT_MS = 60_000;

export interface MemoryOptimizerOptions {
  /** Optimize when more than this many turns sit after the coverage boundary. */
  threshold?: number;
  /** Hard bound on summary length (characters). */
  maxChars?: number;
  /** Max tokens for the summary response. */
  maxTokens?: number;
  timeoutMs?: number;
  model?: string;
  requestLogger?: IRequestLogger;
}

export interface OptimizeOptions {
  /** Fold only up to this turn index (segment boundary); defaults to the last turn. */
  throughIndex?: number;
}

export type OptimizationOutcome =
  | { status: "skipped"; reason: "unknown-session" | "nothing-new" }
  | { status: "updated"; summary: MemorySummary; foldedTurns: number }
  | { status: "failed"; error: OptimizationFailed };

const SUMMARIZER_SYSTEM_PROMPT = [
  "You maintain the long-term memory of a conversation between a user and an assistant.",
  "Merge the previous summary (if any) with the new turns into one updated summary.",
  "Keep chronology. Keep user goals, stated preferences, facts, decisions, names, numbers and open questions.",
  "Drop greetings, filler and repetition. Do not invent anything. No preamble.",
].join(" ");

/** Turns after the coverage boundary. */
export function unsummarizedCount(snapshot: SessionSnapshot): number {
  const covered = snapshot.summary ? snapshot.summary.coveredThrough + 1 : 0;
  return Math.max(0, snapshot.turns.length - covered);
}

/** Cut to maxChars at the last sentence end, else the last word break, inside the bound. */
export function clampSummary(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;
  const head = trimmed.slice(0, maxChars);
  const sentenceEnd = Math.max(head.lastIndexOf(". "), head.lastIndexOf(".\n"), head.lastIndexOf("\n"));
  if (sentenceEnd >= maxChars / 2) return head.slice(0, sentenceEnd + 1).trim();
  const wordBreak = head.lastIndexOf(" ");
  return (wordBreak > 0 ? head.slice(0, wordBreak) : head).trim();
}

function renderTurns(turns: readonly Turn[], firstIndex: number): string {
  return turns.map((t, i) => `#${firstIndex + i} ${t.role}: ${t.content}`).join("\n");
}

export class MemoryOptimizer {
  private readonly threshold: number;
  private readonly maxChars: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly store: ISessionStore,
    private readonly llm: ILLM,
    private readonly options: MemoryOptimizerOptions = {}
  ) {
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.maxChars = options.maxChars ?? SUMMARY_MAX_CHARS;
    this.maxTokens = options.maxTokens ?? SUMMARY_MAX_TOKENS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  shouldOptimize(snapshot: SessionSnapshot): boolean {
    return unsummarizedCount(snapshot) > this.threshold;
  }

  buildRequest(previous: MemorySummary | null, turns: readonly Turn[], firstIndex: number): ProviderRequest {
    const turnsBlob = renderTurns(turns, firstIndex);
    const bound = `Keep the summary under ${this.maxChars} characters.`;
    const user = previous
      ? `Previous summary:\n${previous.text}\n\nNew turns:\n${turnsBlob}\n\nUpdate the summary. ${bound}`
      : `Turns:\n${turnsBlob}\n\nProduce the summary. ${bound}`;
    return {
      model: this.options.model ?? this.llm.defaultModel,
      messages: [
        { role: "system", content: SUMMARIZER_SYSTEM_PROMPT },
        { role: "user", content: user },
      ],
      params: { temperature: 0.2, maxTokens: this.maxTokens },
    };
  }

  /**
   * Run one compaction pass. The caller holds the session's exclusion scope.
   * Never throws: failures come back as { status: "failed" } and are logged.
   */
  async optimize(sessionId: string, opts: OptimizeOptions = {}): Promise<OptimizationOutcome> {
    let snapshot: SessionSnapshot | undefined;
    try {
      snapshot = await this.store.load(sessionId);
    } catch (err) {
      return this.fail(sessionId, `session load failed: ${errorMessage(err)}`, err);
    }
    if (!snapshot) return { status: "skipped", reason: "unknown-session" };

    const previous = snapshot.summary;
    const from = previous ? previous.coveredThrough + 1 : 0;
    const lastIndex = snapshot.turns.length - 1;
    const through = Math.min(opts.throughIndex ?? lastIndex, lastIndex);
    if (through < from) {
      logger.debug({ event: "MEMORY_OPTIMIZE_SKIPPED", sessionId, coveredThrough: previous?.coveredThrough }, "Nothing new to fold");
      return { status: "skipped", reason: "nothing-new" };
    }

    const turns = snapshot.turns.slice(from, through + 1);
    const request = this.buildRequest(previous, turns, from);
    const deadline = new Deadline(this.timeoutMs, this.llm.name);
    const start = Date.now();
    let response: ProviderResponse;
    try {
      response = await deadline.race(this.llm.complete(request, { signal: deadline.signal }));
    } catch (err) {
      this.log(sessionId, request, { error: err }, start);
      return this.fail(sessionId, `compaction call failed: ${errorMessage(err)}`, err);
    } finally {
      deadline.clear();
    }
    this.log(sessionId, request, { response }, start);
    logLlmCall(logger, "compaction", request.messages.length, response.text.length, Date.now() - start);

    const text = clampSummary(response.text, this.maxChars);
    if (!text) return this.fail(sessionId, "compaction returned an empty summary");

    const next: MemorySummary = {
      text,
      coveredThrough: through,
      coveredUntil: snapshot.turns[through].timestamp,
      updatedAt: Date.now(),
    };
    let replaced: boolean;
    try {
      replaced = await this.store.replaceSummary(sessionId, next, previous);
    } catch (err) {
      return this.fail(sessionId, `summary write failed: ${errorMessage(err)}`, err);
    }
    if (!replaced) return this.fail(sessionId, "summary changed during compaction");

    logger.info(
      { event: "MEMORY_OPTIMIZED", sessionId, foldedTurns: turns.length, coveredThrough: through, summaryChars: text.length },
      "Memory summary updated"
    );
    return { status: "updated", summary: next, foldedTurns: turns.length };
  }

  private fail(sessionId: string, message: string, cause?: unknown): OptimizationOutcome {
    const error = new OptimizationFailed(message, { cause });
    logger.warn({ event: "MEMORY_OPTIMIZE_FAILED", sessionId, err: message }, "Memory optimization failed; summary unchanged");
    return { status: "failed", error };
  }

  private log(sessionId: string, request: ProviderRequest, outcome: RequestOutcome, start: number): void {
    if (!this.options.requestLogger) return;
    void recordSafely(this.options.requestLogger, sessionId, request, outcome, {
      kind: "compaction",
      latencyMs: Date.now() - start,
    });
  }
}
