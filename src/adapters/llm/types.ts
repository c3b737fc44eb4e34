/**
 * LLM adapter types.
 * Implementations are swapped via config (OpenAI, Anthropic, stub); one is chosen at construction.
 */

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export interface GenerationParams {
  temperature?: number;
  maxTokens?: number;
}

/** Everything a provider needs for one completion. Immutable once built. */
export interface ProviderRequest {
  readonly model: string;
  /** Ordered message list: system context first, then the conversation. */
  readonly messages: readonly Message[];
  readonly params: GenerationParams;
}

export interface Usage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface ProviderResponse {
  text: string;
  model: string;
  usage?: Usage;
  finishReason?: string;
}

/** Incremental text, in the order the vendor sent it. */
export interface StreamDelta {
  type: "delta";
  text: string;
}

/** Terminal record of a cleanly completed stream. Always the last event. */
export interface StreamDone {
  type: "done";
  model: string;
  usage?: Usage;
  finishReason?: string;
}

export type StreamEvent = StreamDelta | StreamDone;

export interface CallOptions {
  /** Aborts the underlying request (deadline or caller cancellation). */
  signal?: AbortSignal;
}

/**
 * LLM adapter interface: request in, assistant reply out.
 *
 * Failures are ProviderUnavailable, ProviderRejected or ProviderTimeout. A stream that is cut
 * off throws instead of ending, so a consumer that sees "done" knows the reply is complete.
 */
export interface ILLM {
  /** Vendor name, used in errors and logs. */
  readonly name: string;
  readonly defaultModel: string;

  complete(request: ProviderRequest, options?: CallOptions): Promise<ProviderResponse>;

  /** Lazy, finite and one-shot: the returned generator cannot be restarted. */
  completeStreaming(request: ProviderRequest, options?: CallOptions): AsyncGenerator<StreamEvent, void, undefined>;
}
