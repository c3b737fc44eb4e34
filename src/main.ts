/**
 * Entry point: load config, wire adapters + memory + orchestrator, start the chat server.
 * Falls back to the stub LLM and no retrieval when provider settings are missing.
 */

import type { Server } from "http";
import { loadConfig, type AppConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { createRetrievalSource } from "./adapters/retrieval";
import { RetrievalMerger } from "./retrieval/merger";
import { InMemorySessionStore } from "./memory/session";
import { FileSessionStore } from "./memory/file-store";
import { HeuristicContinuityClassifier, LlmContinuityClassifier, type IContinuityClassifier } from "./memory/continuity";
import { MemoryOptimizer } from "./memory/optimizer";
import type { ISessionStore } from "./memory/types";
import { ContextBuilder } from "./prompts/context-builder";
import { Orchestrator } from "./pipeline/orchestrator";
import { JsonlRequestLogger, MemoryRequestLogger, type IRequestLogger } from "./logging/request-log";
import { startChatServer } from "./server/chat-server";
import { logger, logError } from "./logging";

/** Build the orchestrator and its collaborators from one config. */
export function buildOrchestrator(config: AppConfig): Orchestrator {
  const llm = createLLM(config);
  const merger = new RetrievalMerger(createRetrievalSource(config), {
    topK: config.retrieval.topK,
    timeoutMs: config.retrieval.timeoutMs,
  });
  const store: ISessionStore =
    config.memory.store === "file" ? new FileSessionStore({ dir: config.memory.sessionsDir }) : new InMemorySessionStore();
  const requestLogger: IRequestLogger = config.requestLog.dir
    ? new JsonlRequestLogger(config.requestLog.dir)
    : new MemoryRequestLogger();

  const classifier: IContinuityClassifier =
    config.continuity.mode === "llm"
      ? new LlmContinuityClassifier(llm, { threshold: config.continuity.threshold, requestLogger })
      : new HeuristicContinuityClassifier({ threshold: config.continuity.threshold });

  const optimizer = new MemoryOptimizer(store, llm, {
    threshold: config.memory.compactionThreshold,
    maxChars: config.memory.summaryMaxChars,
    maxTokens: config.memory.summaryMaxTokens,
    timeoutMs: config.memory.timeoutMs,
    requestLogger,
  });

  const contextBuilder = new ContextBuilder(merger, {
    systemPrompt: config.context.systemPrompt,
    budgetChars: config.context.budgetChars,
    recentTurns: config.memory.recentTurns,
  });

  logger.info(
    {
      event: "RELAY_CONFIGURED",
      llm: llm.name,
      model: llm.defaultModel,
      retrieval: config.retrieval.provider,
      store: config.memory.store,
      continuity: config.continuity.mode,
      requestLog: config.requestLog.dir ?? "memory",
    },
    "Relay configured"
  );

  return new Orchestrator(
    { llm, store, merger, classifier, optimizer, contextBuilder, requestLogger },
    {
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      timeoutMs: config.llm.timeoutMs,
    }
  );
}

async function main(): Promise<void> {
  const config = loadConfig();
  for (const w of config.warnings) {
    logger.warn({ event: "CONFIG_UNKNOWN_PROVIDER", key: w.key, value: w.value }, w.message);
  }
  const orchestrator = buildOrchestrator(config);
  const server: Server = startChatServer(orchestrator, { port: config.server.port });

  const shutdown = (): void => {
    logger.info({ event: "SHUTDOWN" }, "Shutting down; waiting for background work");
    server.close();
    orchestrator
      .idle()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError(logger, err instanceof Error ? err : new Error(String(err)));
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logError(logger, err instanceof Error ? err : new Error(String(err)));
    process.exit(1);
  });
}
