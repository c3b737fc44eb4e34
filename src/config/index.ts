/**
 * Env-based configuration for the relay.
 * Load from .env.local (or process.env). Do not commit secrets.
 *
 * loadConfig() is the single initialization step: components receive their slice of
 * AppConfig at construction and never read the environment themselves.
 */

import "./env";
import * as path from "path";

export type LlmProvider = "openai" | "anthropic" | "stub";
export type RetrievalProvider = "none" | "http" | "openai-vector-store";
export type SessionStoreKind = "memory" | "file";
export type ContinuityMode = "heuristic" | "llm";

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a helpful conversational assistant.",
  "Use the conversation summary and any reference material you are given when they are relevant.",
  "If the reference material does not answer the question, say so instead of guessing.",
].join(" ");

export interface AppConfig {
  /** LLM provider and generation defaults */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    openaiBaseUrl?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    anthropicBaseUrl?: string;
    temperature: number;
    maxTokens: number;
    /** Deadline (ms) for a main completion call, including the whole stream. */
    timeoutMs: number;
    /** Transport-level retries performed by the vendor SDK. */
    maxRetries: number;
  };

  /** Retrieval source for prompt context */
  retrieval: {
    provider: RetrievalProvider;
    url?: string;
    /** Bearer token for the HTTP retrieval service. */
    token?: string;
    openaiApiKey?: string;
    vectorStoreId?: string;
    topK: number;
    timeoutMs: number;
  };

  /** Session memory and compaction */
  memory: {
    store: SessionStoreKind;
    sessionsDir: string;
    /** Compact when the number of turns after the coverage boundary exceeds this. */
    compactionThreshold: number;
    summaryMaxChars: number;
    summaryMaxTokens: number;
    /** Minimum number of most recent turns always sent verbatim. */
    recentTurns: number;
    timeoutMs: number;
  };

  continuity: {
    mode: ContinuityMode;
    /** new_topic results below this confidence are treated as continue. */
    threshold: number;
  };

  context: {
    /** Character budget shared by memory (summary + turns) and retrieval snippets. */
    budgetChars: number;
    systemPrompt: string;
  };

  requestLog: {
    /** Directory for JSONL request logs; undefined keeps records in memory only. */
    dir?: string;
  };

  server: {
    port: number;
  };

  /** Settings that were ignored or replaced by a fallback; logged by the caller once logging is up. */
  warnings: ConfigWarning[];
}

export interface ConfigWarning {
  key: string;
  value: string;
  message: string;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(env: Env, key: string, defaultValue: number, min = 0): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloat(env: Env, key: string, defaultValue: number, min: number, max: number): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) || n < min || n > max ? defaultValue : n;
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const v = value?.toLowerCase();
  return allowed.find((a) => a === v) ?? fallback;
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER selects the adapter (openai, anthropic, stub); RETRIEVAL_PROVIDER the retrieval source.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const warnings: ConfigWarning[] = [];
  const rawLlm = getEnv(env, "LLM_PROVIDER");
  const llmProvider = rawLlm === undefined ? "openai" : pick(rawLlm, ["openai", "anthropic", "stub"] as const, "stub");
  if (rawLlm !== undefined && llmProvider !== rawLlm.toLowerCase()) {
    warnings.push({ key: "LLM_PROVIDER", value: rawLlm, message: "Unknown LLM provider; using stub" });
  }
  const rawRetrieval = getEnv(env, "RETRIEVAL_PROVIDER");
  const retrievalProvider = pick(rawRetrieval, ["none", "http", "openai-vector-store"] as const, "none");
  if (rawRetrieval !== undefined && retrievalProvider !== rawRetrieval.toLowerCase()) {
    warnings.push({ key: "RETRIEVAL_PROVIDER", value: rawRetrieval, message: "Unknown retrieval provider; retrieval disabled" });
  }
  const requestLogDir = env.REQUEST_LOG_DIR;

  return {
    llm: {
      provider: llmProvider,
      openaiApiKey: getEnv(env, "OPENAI_API_KEY"),
      openaiModel: getEnv(env, "OPENAI_MODEL_NAME") || "gpt-4o-mini",
      openaiBaseUrl: getEnv(env, "OPENAI_BASE_URL"),
      anthropicApiKey: getEnv(env, "ANTHROPIC_API_KEY"),
      anthropicModel: getEnv(env, "ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      anthropicBaseUrl: getEnv(env, "ANTHROPIC_BASE_URL"),
      temperature: getFloat(env, "LLM_TEMPERATURE", 0.7, 0, 2),
      maxTokens: getInt(env, "LLM_MAX_TOKENS", 1024, 1),
      timeoutMs: getInt(env, "LLM_TIMEOUT_MS", 60_000, 1),
      maxRetries: getInt(env, "LLM_MAX_RETRIES", 2),
    },
    retrieval: {
      provider: retrievalProvider,
      url: getEnv(env, "RETRIEVAL_URL"),
      token: getEnv(env, "RETRIEVAL_TOKEN"),
      openaiApiKey: getEnv(env, "OPENAI_API_KEY"),
      vectorStoreId: getEnv(env, "OPENAI_VECTOR_STORE_ID"),
      topK: getInt(env, "RETRIEVAL_TOP_K", 5, 1),
      timeoutMs: getInt(env, "RETRIEVAL_TIMEOUT_MS", 5_000, 1),
    },
    memory: {
      store: pick(getEnv(env, "MEMORY_STORE"), ["memory", "file"] as const, "memory"),
      sessionsDir: path.resolve(getEnv(env, "SESSIONS_DIR") || path.join("data", "sessions")),
      compactionThreshold: getInt(env, "MEMORY_COMPACTION_THRESHOLD", 40, 1),
      summaryMaxChars: getInt(env, "MEMORY_SUMMARY_MAX_CHARS", 2_000, 100),
      summaryMaxTokens: getInt(env, "MEMORY_SUMMARY_MAX_TOKENS", 600, 1),
      recentTurns: getInt(env, "MEMORY_RECENT_TURNS", 12, 1),
      timeoutMs: getInt(env, "MEMORY_TIMEOUT_MS", 60_000, 1),
    },
    continuity: {
      mode: pick(getEnv(env, "CONTINUITY_MODE"), ["heuristic", "llm"] as const, "heuristic"),
      threshold: getFloat(env, "CONTINUITY_THRESHOLD", 0.7, 0, 1),
    },
    context: {
      budgetChars: getInt(env, "CONTEXT_BUDGET_CHARS", 12_000, 500),
      systemPrompt: getEnv(env, "SYSTEM_PROMPT") || DEFAULT_SYSTEM_PROMPT,
    },
    requestLog: {
      /** REQUEST_LOG_DIR unset = default directory; set to empty string = in-memory only. */
      dir: requestLogDir === undefined ? path.resolve("data", "requests") : requestLogDir.trim() || undefined,
    },
    server: {
      port: getInt(env, "PORT", 8080, 0),
    },
    warnings,
  };
}
