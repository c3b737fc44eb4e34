/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import {
  ProviderError,
  ProviderTimeout,
  ProviderUnavailable,
  errorMessage,
  providerErrorFromStatus,
} from "../../errors";
import type { ILLM, ProviderRequest, ProviderResponse, StreamEvent, CallOptions, Usage } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
  /** API root (default https://api.anthropic.com). */
  baseUrl?: string;
  maxRetries?: number;
  timeoutMs?: number;
}

const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_SDK_TIMEOUT_MS = 600_000;

export class AnthropicLLM implements ILLM {
  readonly name = "anthropic";
  private client: Anthropic;
  private readonly sdkTimeoutMs: number;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.sdkTimeoutMs = cfg.timeoutMs ?? DEFAULT_SDK_TIMEOUT_MS;
    this.client = new Anthropic({
      apiKey: cfg.apiKey,
      baseURL: cfg.baseUrl,
      maxRetries: cfg.maxRetries ?? 2,
      timeout: this.sdkTimeoutMs,
    });
  }

  get defaultModel(): string {
    return this.cfg.model;
  }

  /** System messages go in the top-level system field; the rest keep their order. */
  private body(request: ProviderRequest) {
    const system = request.messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs: Anthropic.MessageParam[] = request.messages
      .filter((m) => m.role !== "system")
      .map((m): Anthropic.MessageParam => ({ role: m.role === "assistant" ? "assistant" : "user", content: m.content }));
    return {
      model: request.model,
      max_tokens: request.params.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.params.temperature,
      system: system || undefined,
      messages: msgs,
    };
  }

  async complete(request: ProviderRequest, options?: CallOptions): Promise<ProviderResponse> {
    try {
      const response = await this.client.messages.create(
        { ...this.body(request), stream: false },
        { signal: options?.signal }
      );
      const text = response.content
        .map((b) => (b.type === "text" ? b.text : ""))
        .join("");
      const { input_tokens, output_tokens } = response.usage;
      return {
        text,
        model: response.model,
        usage: { promptTokens: input_tokens, completionTokens: output_tokens, totalTokens: input_tokens + output_tokens },
        finishReason: response.stop_reason ?? undefined,
      };
    } catch (err) {
      throw this.toProviderError(err, options?.signal);
    }
  }

  async *completeStreaming(request: ProviderRequest, options?: CallOptions): AsyncGenerator<StreamEvent, void, undefined> {
    let model = request.model;
    let inputTokens: number | undefined;
    let outputTokens: number | undefined;
    let finishReason: string | undefined;
    let stopped = false;
    try {
      const stream = await this.client.messages.create(
        { ...this.body(request), stream: true },
        { signal: options?.signal }
      );
      for await (const event of stream) {
        switch (event.type) {
          case "message_start":
            model = event.message.model || model;
            inputTokens = event.message.usage.input_tokens;
            break;
          case "content_block_delta":
            if (event.delta.type === "text_delta" && event.delta.text) {
              yield { type: "delta", text: event.delta.text };
            }
            break;
          case "message_delta":
            outputTokens = event.usage.output_tokens;
            finishReason = event.delta.stop_reason ?? finishReason;
            break;
          case "message_stop":
            stopped = true;
            break;
          default:
            break;
        }
      }
    } catch (err) {
      throw this.toProviderError(err, options?.signal);
    }
    if (!stopped) throw new ProviderUnavailable("stream ended before completion", this.name);
    const usage: Usage = {
      promptTokens: inputTokens,
      completionTokens: outputTokens,
      totalTokens: inputTokens !== undefined && outputTokens !== undefined ? inputTokens + outputTokens : undefined,
    };
    yield { type: "done", model, usage, finishReason };
  }

  private toProviderError(err: unknown, signal?: AbortSignal): ProviderError {
    if (err instanceof ProviderError) return err;
    if (signal?.aborted && signal.reason instanceof ProviderError) return signal.reason;
    if (err instanceof Anthropic.APIConnectionTimeoutError) {
      return new ProviderTimeout(this.sdkTimeoutMs, this.name, { cause: err });
    }
    if (err instanceof Anthropic.APIUserAbortError) {
      return new ProviderUnavailable("request aborted", this.name, { cause: err });
    }
    if (err instanceof Anthropic.APIConnectionError) {
      return new ProviderUnavailable(err.message, this.name, { cause: err });
    }
    if (err instanceof Anthropic.APIError) {
      return providerErrorFromStatus(err.status, err.message, this.name, err);
    }
    return new ProviderUnavailable(errorMessage(err), this.name, { cause: err });
  }
}
