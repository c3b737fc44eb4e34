/**
 * Per-exchange metrics. Latencies and sizes are logged; the last exchange's values are kept for
 * the health endpoint and tests.
 */

import { logger } from "../logging";

/** Timing (ms) and sizes for one exchange. */
export interface ExchangeMetrics {
  sessionId: string;
  exchangeId: string;
  streamed: boolean;
  outcome: "done" | "failed";
  retrievalLatencyMs?: number;
  /** Dispatch to final provider event. */
  llmLatencyMs?: number;
  /** Dispatch to first streamed delta. */
  firstDeltaMs?: number;
  /** Exchange start to reply returned. */
  totalLatencyMs?: number;
  snippetsIncluded?: number;
  replyChars?: number;
  /** Approximate completion token count from the provider's usage record. */
  responseTokens?: number;
}

let lastExchangeMetrics: ExchangeMetrics | null = null;
const totals = { exchanges: 0, failures: 0 };

export function recordExchangeMetrics(metrics: ExchangeMetrics): void {
  lastExchangeMetrics = { ...metrics };
  totals.exchanges++;
  if (metrics.outcome === "failed") totals.failures++;
  logger.info(
    {
      event: "EXCHANGE_METRICS",
      session_id: metrics.sessionId,
      exchange_id: metrics.exchangeId,
      streamed: metrics.streamed,
      outcome: metrics.outcome,
      retrieval_latency_ms: metrics.retrievalLatencyMs,
      llm_latency_ms: metrics.llmLatencyMs,
      first_delta_ms: metrics.firstDeltaMs,
      total_latency_ms: metrics.totalLatencyMs,
      snippets_included: metrics.snippetsIncluded,
      reply_chars: metrics.replyChars,
      response_tokens: metrics.responseTokens,
    },
    "Exchange latency"
  );
}

export function getLastExchangeMetrics(): ExchangeMetrics | null {
  return lastExchangeMetrics ? { ...lastExchangeMetrics } : null;
}

export function getExchangeTotals(): { exchanges: number; failures: number } {
  return { ...totals };
}

/** Test helper. */
export function resetMetrics(): void {
  lastExchangeMetrics = null;
  totals.exchanges = 0;
  totals.failures = 0;
}
