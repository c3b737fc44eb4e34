/**
 * LLM adapter factory: returns implementation based on config.
 * The vendor is chosen once, here; callers only see ILLM.
 */

import type { AppConfig } from "../../config";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";
import { logger } from "../../logging";

export type {
  ILLM,
  Role,
  Message,
  GenerationParams,
  ProviderRequest,
  ProviderResponse,
  StreamEvent,
  StreamDelta,
  StreamDone,
  CallOptions,
  Usage,
} from "./types";
export { Deadline } from "./deadline";
export { StubLLM } from "./stub";
export type { StubLlmOptions } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export function createLLM(config: AppConfig): ILLM {
  const { provider, openaiApiKey, openaiModel, openaiBaseUrl, anthropicApiKey, anthropicModel, anthropicBaseUrl, maxRetries } =
    config.llm;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAILLM({
      apiKey: openaiApiKey,
      model: openaiModel || "gpt-4o-mini",
      baseUrl: openaiBaseUrl,
      maxRetries,
    });
  }
  if (provider === "anthropic" && anthropicApiKey) {
    return new AnthropicLLM({
      apiKey: anthropicApiKey,
      model: anthropicModel || "claude-3-5-sonnet-20241022",
      baseUrl: anthropicBaseUrl,
      maxRetries,
    });
  }
  if (provider !== "stub") {
    logger.warn({ event: "LLM_PROVIDER_UNCONFIGURED", provider }, "No API key for LLM provider; using stub");
  }
  return new StubLLM();
}
