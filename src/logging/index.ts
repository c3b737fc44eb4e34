/**
 * Structured logging for the relay.
 * Logs provider calls, exchange state transitions, and non-fatal side-channel failures. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info, silent under NODE_ENV=test)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import "../config/env";
import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  file?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function parseLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

const defaultConfig: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL) ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test" && process.stdout.isTTY === true,
  file: process.env.LOG_FILE?.trim() || undefined,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = config.file ?? defaultConfig.file;

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log a provider call (sizes only; prompt text stays in the request log). */
export function logLlmCall(
  log: pino.Logger,
  kind: string,
  messageCount: number,
  responseLength: number,
  durationMs?: number
): void {
  log.info({ event: "LLM_CALL", kind, messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log an exchange state transition. */
export function logExchangeState(log: pino.Logger, sessionId: string, exchangeId: string, state: string): void {
  log.debug({ event: "EXCHANGE_STATE", sessionId, exchangeId, state }, `Exchange ${state}`);
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
