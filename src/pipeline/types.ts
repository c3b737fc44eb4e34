/**
 * Exchange types shared by the orchestrator and its callers.
 */

import type { Usage } from "../adapters/llm";
import type { ProviderError } from "../errors";

/**
 * RECEIVED → CONTEXT_ASSEMBLED → DISPATCHED → (STREAMING | COMPLETED) → LOGGED → MEMORY_UPDATED → DONE.
 * FAILED is terminal and reachable from any state before DONE.
 */
export type ExchangeState =
  | "RECEIVED"
  | "CONTEXT_ASSEMBLED"
  | "DISPATCHED"
  | "STREAMING"
  | "COMPLETED"
  | "LOGGED"
  | "MEMORY_UPDATED"
  | "DONE"
  | "FAILED";

export interface StateChange {
  sessionId: string;
  exchangeId: string;
  state: ExchangeState;
  /** Set when state is FAILED. */
  error?: Error;
}

export interface ExchangeOptions {
  /** Deadline for the provider call in ms (overrides the configured default). */
  deadlineMs?: number;
  /** Retrieval result bound for this exchange. */
  topK?: number;
}

export interface ReplyResult {
  sessionId: string;
  exchangeId: string;
  text: string;
  model: string;
  usage?: Usage;
  finishReason?: string;
}

export type ReplyEvent =
  | { type: "delta"; text: string }
  | ({ type: "done" } & ReplyResult)
  | { type: "truncated"; sessionId: string; exchangeId: string; error: ProviderError; partialText: string };

export interface OrchestratorCallbacks {
  /** Observes every exchange state transition. */
  onStateChange?: (change: StateChange) => void;
}
