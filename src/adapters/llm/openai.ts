/**
 * OpenAI Chat Completions LLM adapter.
 */

import OpenAI from "openai";
import {
  ProviderError,
  ProviderTimeout,
  ProviderUnavailable,
  errorMessage,
  providerErrorFromStatus,
} from "../../errors";
import type { ILLM, Message, ProviderRequest, ProviderResponse, StreamEvent, CallOptions, Usage } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  /** SDK-level retries for transient failures. */
  maxRetries?: number;
  /** SDK-level request timeout (ms); the caller's deadline is passed separately as a signal. */
  timeoutMs?: number;
}

const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_SDK_TIMEOUT_MS = 600_000;

function toOpenAIMessage(m: Message): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    default:
      return { role: "user", content: m.content };
  }
}

function toUsage(u: OpenAI.CompletionUsage | null | undefined): Usage | undefined {
  if (!u) return undefined;
  return { promptTokens: u.prompt_tokens, completionTokens: u.completion_tokens, totalTokens: u.total_tokens };
}

export class OpenAILLM implements ILLM {
  readonly name = "openai";
  private client: OpenAI;
  private readonly sdkTimeoutMs: number;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.sdkTimeoutMs = cfg.timeoutMs ?? DEFAULT_SDK_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: cfg.apiKey,
      baseURL: cfg.baseUrl,
      maxRetries: cfg.maxRetries ?? 2,
      timeout: this.sdkTimeoutMs,
    });
  }

  get defaultModel(): string {
    return this.cfg.model;
  }

  private body(request: ProviderRequest) {
    return {
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      max_tokens: request.params.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.params.temperature,
    };
  }

  async complete(request: ProviderRequest, options?: CallOptions): Promise<ProviderResponse> {
    try {
      const response = await this.client.chat.completions.create(
        { ...this.body(request), stream: false },
        { signal: options?.signal }
      );
      const choice = response.choices[0];
      return {
        text: choice?.message?.content ?? "",
        model: response.model,
        usage: toUsage(response.usage),
        finishReason: choice?.finish_reason ?? undefined,
      };
    } catch (err) {
      throw this.toProviderError(err, options?.signal);
    }
  }

  async *completeStreaming(request: ProviderRequest, options?: CallOptions): AsyncGenerator<StreamEvent, void, undefined> {
    let model = request.model;
    let usage: Usage | undefined;
    let finishReason: string | undefined;
    try {
      const stream = await this.client.chat.completions.create(
        { ...this.body(request), stream: true, stream_options: { include_usage: true } },
        { signal: options?.signal }
      );
      for await (const chunk of stream) {
        model = chunk.model || model;
        usage = toUsage(chunk.usage) ?? usage;
        const choice = chunk.choices[0];
        const delta = choice?.delta?.content;
        if (delta) yield { type: "delta", text: delta };
        if (choice?.finish_reason) finishReason = choice.finish_reason;
      }
    } catch (err) {
      throw this.toProviderError(err, options?.signal);
    }
    if (!finishReason) throw new ProviderUnavailable("stream ended before completion", this.name);
    yield { type: "done", model, usage, finishReason };
  }

  private toProviderError(err: unknown, signal?: AbortSignal): ProviderError {
    if (err instanceof ProviderError) return err;
    if (signal?.aborted && signal.reason instanceof ProviderError) return signal.reason;
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderTimeout(this.sdkTimeoutMs, this.name, { cause: err });
    }
    if (err instanceof OpenAI.APIUserAbortError) {
      return new ProviderUnavailable("request aborted", this.name, { cause: err });
    }
    if (err instanceof OpenAI.APIConnectionError) {
      return new ProviderUnavailable(err.message, this.name, { cause: err });
    }
    if (err instanceof OpenAI.APIError) {
      return providerErrorFromStatus(err.status, err.message, this.name, err);
    }
    return new ProviderUnavailable(errorMessage(err), this.name, { cause: err });
  }
}
