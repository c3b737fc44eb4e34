/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Returns a fixed (or computed) reply; can stream it in chunks, delay, or fail on demand.
 */

import { ProviderUnavailable, type ProviderError } from "../../errors";
import type { ILLM, ProviderRequest, ProviderResponse, StreamEvent, CallOptions } from "./types";

export interface StubLlmOptions {
  reply?: string | ((request: ProviderRequest) => string);
  /** Characters per streamed delta (default 8). */
  chunkSize?: number;
  /** Wait this long before responding (and between streamed deltas). */
  delayMs?: number;
  /** Fail every call (after the delay) with this error. */
  error?: ProviderError;
  /** Streaming only: fail with this error after this many deltas. */
  failAfterChunks?: { count: number; error: ProviderError };
  model?: string;
}

export class StubLLM implements ILLM {
  readonly name = "stub";
  readonly defaultModel: string;
  /** Every request received, in order. */
  readonly requests: ProviderRequest[] = [];

  constructor(private readonly options: StubLlmOptions = {}) {
    this.defaultModel = options.model ?? "stub-model";
  }

  async complete(request: ProviderRequest, callOptions?: CallOptions): Promise<ProviderResponse> {
    this.requests.push(request);
    await this.wait(callOptions?.signal);
    if (this.options.error) throw this.options.error;
    const text = this.replyFor(request);
    return { text, model: request.model, usage: estimateUsage(request, text), finishReason: "stop" };
  }

  async *completeStreaming(request: ProviderRequest, callOptions?: CallOptions): AsyncGenerator<StreamEvent, void, undefined> {
    this.requests.push(request);
    await this.wait(callOptions?.signal);
    if (this.options.error) throw this.options.error;
    const text = this.replyFor(request);
    const size = Math.max(1, this.options.chunkSize ?? 8);
    const failAfter = this.options.failAfterChunks;
    let sent = 0;
    for (let i = 0; i < text.length; i += size) {
      if (failAfter && sent >= failAfter.count) throw failAfter.error;
      if (sent > 0) await this.wait(callOptions?.signal);
      yield { type: "delta", text: text.slice(i, i + size) };
      sent++;
    }
    if (failAfter && sent >= failAfter.count) throw failAfter.error;
    yield { type: "done", model: request.model, usage: estimateUsage(request, text), finishReason: "stop" };
  }

  private replyFor(request: ProviderRequest): string {
    const reply = this.options.reply ?? "";
    return typeof reply === "function" ? reply(request) : reply;
  }

  private wait(signal?: AbortSignal): Promise<void> {
    const ms = this.options.delayMs ?? 0;
    if (ms <= 0) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(signal?.reason instanceof Error ? signal.reason : new ProviderUnavailable("request aborted", this.name));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

function estimateUsage(request: ProviderRequest, text: string): { promptTokens: number; completionTokens: number; totalTokens: number } {
  const promptChars = request.messages.reduce((n, m) => n + m.content.length, 0);
  const promptTokens = Math.ceil(promptChars / 4);
  const completionTokens = Math.ceil(text.length / 4);
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}
