/**
 * Orchestrator: coordinates continuity + retrieval -> context -> LLM -> request log -> memory.
 * One exchange per user message; exchanges on the same session are serialized, different
 * sessions run concurrently.
 */

import * as crypto from "crypto";
import type { ILLM, ProviderRequest, ProviderResponse, StreamDone } from "../adapters/llm";
import { Deadline } from "../adapters/llm";
import { InvalidPrompt, ProviderUnavailable, RelayError, asProviderError, errorMessage, type ProviderError } from "../errors";
import { logError, logExchangeState, logLlmCall, logger } from "../logging";
import { recordSafely, settleRequestLogs, type IRequestLogger, type RequestOutcome } from "../logging/request-log";
import type { ClassificationResult, IContinuityClassifier } from "../memory/continuity";
import type { MemoryOptimizer } from "../memory/optimizer";
import type { ISessionStore, Turn } from "../memory/types";
import { recordExchangeMetrics } from "../metrics";
import type { ContextBuilder } from "../prompts/context-builder";
import type { RetrievalMerger } from "../retrieval/merger";
import { retrievalQuery } from "../retrieval/query";
import { KeyedMutex } from "./session-lock";
import type {
  ExchangeOptions,
  ExchangeState,
  OrchestratorCallbacks,
  ReplyEvent,
  ReplyResult,
} from "./types";

const DEFAULT_LLM_TIMEOUT_MS = 60_000;

export interface OrchestratorDeps {
  llm: ILLM;
  store: ISessionStore;
  merger: RetrievalMerger;
  classifier: IContinuityClassifier;
  optimizer: MemoryOptimizer;
  contextBuilder: ContextBuilder;
  requestLogger?: IRequestLogger;
}

export interface OrchestratorConfig {
  /** Model for chat requests; defaults to the adapter's default model. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Default deadline for the provider call. */
  timeoutMs?: number;
}

interface Exchange {
  readonly sessionId: string;
  readonly exchangeId: string;
  readonly streamed: boolean;
  readonly startedAt: number;
  state: ExchangeState;
  retrievalLatencyMs?: number;
  firstDeltaMs?: number;
  snippetsIncluded?: number;
}

interface QueuedOptimization {
  /** undefined = fold everything. */
  throughIndex?: number;
}

function widest(a: number | undefined, b: number | undefined): number | undefined {
  return a === undefined || b === undefined ? undefined : Math.max(a, b);
}

function isSettled(state: ExchangeState): boolean {
  return state === "DONE" || state === "FAILED";
}

export class Orchestrator {
  private readonly locks = new KeyedMutex();
  /** Background work (request log writes, optimization passes) per session. */
  private readonly pending = new Map<string, Set<Promise<void>>>();
  private readonly queuedOptimizations = new Map<string, QueuedOptimization>();

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly config: OrchestratorConfig = {},
    private readonly callbacks: OrchestratorCallbacks = {}
  ) {}

  /**
   * Non-streaming exchange. Resolves with the full reply; rejects with a ProviderError when the
   * provider call fails (the user turn stays recorded), or InvalidPrompt before anything is recorded.
   */
  async reply(sessionId: string, content: string, options: ExchangeOptions = {}): Promise<ReplyResult> {
    const ex = this.begin(sessionId, content, false);
    return this.locks.runExclusive(sessionId, async () => {
      try {
        const request = await this.prepare(ex, content, options);
        const deadline = this.createDeadline(options);
        this.transition(ex, "DISPATCHED");
        const dispatchedAt = Date.now();
        let response: ProviderResponse;
        try {
          response = await deadline.race(this.deps.llm.complete(request, { signal: deadline.signal }));
        } catch (err) {
          throw this.providerFailure(ex, request, err, dispatchedAt);
        } finally {
          deadline.clear();
        }
        this.transition(ex, "COMPLETED");
        return await this.complete(ex, request, response, dispatchedAt);
      } catch (err) {
        this.fail(ex, err);
        throw err;
      }
    });
  }

  /**
   * Streaming exchange. Yields deltas in provider order, then exactly one `done` or `truncated`.
   * Provider failures end the stream with `truncated` instead of throwing. The session stays
   * locked until the generator finishes; a consumer that stops early fails the exchange.
   */
  async *replyStreaming(
    sessionId: string,
    content: string,
    options: ExchangeOptions = {}
  ): AsyncGenerator<ReplyEvent, void, undefined> {
    const ex = this.begin(sessionId, content, true);
    const release = await this.locks.acquire(sessionId);
    let request: ProviderRequest | undefined;
    let dispatchedAt = Date.now();
    try {
      request = await this.prepare(ex, content, options);
      const deadline = this.createDeadline(options);
      this.transition(ex, "DISPATCHED");
      dispatchedAt = Date.now();
      let text = "";
      let response: ProviderResponse;
      try {
        let done: StreamDone | undefined;
        for await (const event of deadline.iterate(this.deps.llm.completeStreaming(request, { signal: deadline.signal }))) {
          if (ex.state !== "STREAMING") this.transition(ex, "STREAMING");
          if (event.type === "done") {
            done = event;
            continue;
          }
          if (!text) ex.firstDeltaMs = Date.now() - dispatchedAt;
          text += event.text;
          yield { type: "delta", text: event.text };
        }
        if (!done) throw new ProviderUnavailable("stream ended before completion", this.deps.llm.name);
        response = { text, model: done.model, usage: done.usage, finishReason: done.finishReason };
      } catch (err) {
        const error = this.providerFailure(ex, request, err, dispatchedAt);
        this.fail(ex, error);
        yield { type: "truncated", sessionId, exchangeId: ex.exchangeId, error, partialText: text };
        return;
      } finally {
        deadline.clear();
      }
      const result = await this.complete(ex, request, response, dispatchedAt);
      yield { type: "done", ...result };
    } catch (err) {
      this.fail(ex, err);
      throw err;
    } finally {
      if (!isSettled(ex.state)) {
        const error = new ProviderUnavailable("stream abandoned by consumer", this.deps.llm.name);
        if (request) this.log(ex, request, { error }, Date.now() - dispatchedAt);
        this.fail(ex, error);
      }
      release();
    }
  }

  handle(sessionId: string, content: string, streaming: true, options?: ExchangeOptions): AsyncGenerator<ReplyEvent, void, undefined>;
  handle(sessionId: string, content: string, streaming: false, options?: ExchangeOptions): Promise<ReplyResult>;
  handle(
    sessionId: string,
    content: string,
    streaming: boolean,
    options?: ExchangeOptions
  ): Promise<ReplyResult> | AsyncGenerator<ReplyEvent, void, undefined>;
  handle(
    sessionId: string,
    content: string,
    streaming: boolean,
    options: ExchangeOptions = {}
  ): Promise<ReplyResult> | AsyncGenerator<ReplyEvent, void, undefined> {
    return streaming ? this.replyStreaming(sessionId, content, options) : this.reply(sessionId, content, options);
  }

  /**
   * Resolves once queued background work for the session (or every session) has finished,
   * request log writes included.
   */
  async idle(sessionId?: string): Promise<void> {
    for (;;) {
      const work =
        sessionId !== undefined
          ? [...(this.pending.get(sessionId) ?? [])]
          : [...this.pending.values()].flatMap((set) => [...set]);
      if (work.length === 0) break;
      await Promise.all(work);
    }
    // Compaction and classification records are written by their own components.
    if (this.deps.requestLogger) await settleRequestLogs(this.deps.requestLogger, sessionId);
  }

  private begin(sessionId: string, content: string, streamed: boolean): Exchange {
    if (!sessionId.trim()) throw new InvalidPrompt("session_id is required");
    if (!content.trim()) throw new InvalidPrompt("content is empty");
    const ex: Exchange = {
      sessionId,
      exchangeId: crypto.randomUUID(),
      streamed,
      startedAt: Date.now(),
      state: "RECEIVED",
    };
    this.transition(ex, "RECEIVED");
    return ex;
  }

  /** Record the user turn and build the provider request. Runs inside the session lock. */
  private async prepare(ex: Exchange, content: string, options: ExchangeOptions): Promise<ProviderRequest> {
    const { store, merger, contextBuilder } = this.deps;
    const before = await store.load(ex.sessionId);
    const history = before?.turns ?? [];

    // Classify first: a short follow-up is searched together with the question it follows.
    const classification = await this.classify(ex.sessionId, content, history);
    const query = retrievalQuery(content, history, classification.label);
    if (query !== content.trim()) {
      logger.debug({ event: "RETRIEVAL_QUERY_BLENDED", sessionId: ex.sessionId, queryChars: query.length }, "Follow-up blended into retrieval query");
    }
    const retrievalStart = Date.now();
    const snippets = await merger.fetch(query, options.topK);
    ex.retrievalLatencyMs = Date.now() - retrievalStart;

    const userTurn: Turn = {
      role: "user",
      content,
      timestamp: Date.now(),
      ...(snippets.length > 0 ? { snippets } : {}),
    };
    const userIndex = await store.appendTurn(ex.sessionId, userTurn);

    if (classification.label === "new_topic" && userIndex > 0) {
      await store.markSegment(ex.sessionId, userIndex);
      logger.info(
        { event: "TOPIC_SEGMENT_STARTED", sessionId: ex.sessionId, turnIndex: userIndex, confidence: classification.confidence },
        "New topic; folding earlier turns into memory"
      );
      this.scheduleOptimization(ex.sessionId, userIndex - 1);
    }

    const context = contextBuilder.build({
      turns: [...history, userTurn],
      summary: before?.summary ?? null,
      snippets,
      segmentStart: before?.segmentStart,
    });
    ex.snippetsIncluded = context.retrieval.included.length;

    const request: ProviderRequest = {
      model: this.config.model ?? this.deps.llm.defaultModel,
      messages: context.messages,
      params: { temperature: this.config.temperature, maxTokens: this.config.maxTokens },
    };
    this.transition(ex, "CONTEXT_ASSEMBLED");
    return request;
  }

  private async classify(sessionId: string, content: string, history: readonly Turn[]): Promise<ClassificationResult> {
    try {
      return await this.deps.classifier.classify(content, history, { sessionId });
    } catch (err) {
      logger.warn({ event: "CONTINUITY_FAILED", sessionId, err: errorMessage(err) }, "Continuity classification failed; assuming continue");
      return { label: "continue", confidence: 0, reason: "classifier error" };
    }
  }

  /** Success path after the provider reply is complete. */
  private async complete(
    ex: Exchange,
    request: ProviderRequest,
    response: ProviderResponse,
    dispatchedAt: number
  ): Promise<ReplyResult> {
    const llmLatencyMs = Date.now() - dispatchedAt;
    logLlmCall(logger, "chat", request.messages.length, response.text.length, llmLatencyMs);

    await this.deps.store.appendTurn(ex.sessionId, { role: "assistant", content: response.text, timestamp: Date.now() });
    this.log(ex, request, { response }, llmLatencyMs);
    this.transition(ex, "LOGGED");

    const snapshot = await this.deps.store.load(ex.sessionId);
    if (snapshot && this.deps.optimizer.shouldOptimize(snapshot)) this.scheduleOptimization(ex.sessionId);
    this.transition(ex, "MEMORY_UPDATED");

    recordExchangeMetrics({
      sessionId: ex.sessionId,
      exchangeId: ex.exchangeId,
      streamed: ex.streamed,
      outcome: "done",
      retrievalLatencyMs: ex.retrievalLatencyMs,
      llmLatencyMs,
      firstDeltaMs: ex.firstDeltaMs,
      totalLatencyMs: Date.now() - ex.startedAt,
      snippetsIncluded: ex.snippetsIncluded,
      replyChars: response.text.length,
      responseTokens: response.usage?.completionTokens,
    });
    this.transition(ex, "DONE");

    return {
      sessionId: ex.sessionId,
      exchangeId: ex.exchangeId,
      text: response.text,
      model: response.model,
      usage: response.usage,
      finishReason: response.finishReason,
    };
  }

  private providerFailure(ex: Exchange, request: ProviderRequest, err: unknown, dispatchedAt: number): ProviderError {
    const error = asProviderError(err, this.deps.llm.name);
    this.log(ex, request, { error }, Date.now() - dispatchedAt);
    return error;
  }

  private fail(ex: Exchange, err: unknown): void {
    if (isSettled(ex.state)) return;
    const error = err instanceof Error ? err : new Error(String(err));
    this.transition(ex, "FAILED", error);
    logError(logger, error, {
      event: "EXCHANGE_FAILED",
      sessionId: ex.sessionId,
      exchangeId: ex.exchangeId,
      code: error instanceof RelayError ? error.code : undefined,
    });
    recordExchangeMetrics({
      sessionId: ex.sessionId,
      exchangeId: ex.exchangeId,
      streamed: ex.streamed,
      outcome: "failed",
      retrievalLatencyMs: ex.retrievalLatencyMs,
      totalLatencyMs: Date.now() - ex.startedAt,
    });
  }

  private transition(ex: Exchange, state: ExchangeState, error?: Error): void {
    ex.state = state;
    logExchangeState(logger, ex.sessionId, ex.exchangeId, state);
    if (!this.callbacks.onStateChange) return;
    try {
      this.callbacks.onStateChange({ sessionId: ex.sessionId, exchangeId: ex.exchangeId, state, error });
    } catch (err) {
      logger.warn({ event: "STATE_CALLBACK_FAILED", state, err: errorMessage(err) }, "onStateChange threw");
    }
  }

  private createDeadline(options: ExchangeOptions): Deadline {
    return new Deadline(options.deadlineMs ?? this.config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS, this.deps.llm.name);
  }

  /** One record per exchange, written off the critical path. */
  private log(ex: Exchange, request: ProviderRequest, outcome: RequestOutcome, latencyMs: number): void {
    if (!this.deps.requestLogger) return;
    this.track(
      ex.sessionId,
      recordSafely(this.deps.requestLogger, ex.sessionId, request, outcome, {
        kind: "chat",
        latencyMs,
        streamed: ex.streamed,
        id: ex.exchangeId,
      })
    );
  }

  /**
   * Queue an optimization pass under the session lock. While one is queued, further requests merge
   * into it and the widest fold wins.
   */
  private scheduleOptimization(sessionId: string, throughIndex?: number): void {
    const queued = this.queuedOptimizations.get(sessionId);
    if (queued) {
      queued.throughIndex = widest(queued.throughIndex, throughIndex);
      return;
    }
    const entry: QueuedOptimization = { throughIndex };
    this.queuedOptimizations.set(sessionId, entry);
    this.track(
      sessionId,
      this.locks.runExclusive(sessionId, async () => {
        this.queuedOptimizations.delete(sessionId);
        await this.deps.optimizer.optimize(sessionId, { throughIndex: entry.throughIndex });
      })
    );
  }

  private track(sessionId: string, work: Promise<void>): void {
    let set = this.pending.get(sessionId);
    if (!set) {
      set = new Set();
      this.pending.set(sessionId, set);
    }
    const owner = set;
    const tracked: Promise<void> = work
      .catch((err: unknown) => {
        logger.warn({ event: "BACKGROUND_TASK_FAILED", sessionId, err: errorMessage(err) }, "Background task failed");
      })
      .finally(() => {
        owner.delete(tracked);
        if (owner.size === 0 && this.pending.get(sessionId) === owner) this.pending.delete(sessionId);
      });
    owner.add(tracked);
  }
}
