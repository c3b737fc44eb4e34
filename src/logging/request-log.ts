/**
 * Request log: an append-only audit trail of every provider request and its response or error,
 * keyed by session. Written once per call by the caller of the provider (never by the adapter),
 * so transport retries inside an SDK never produce duplicate records.
 */

import * as crypto from "crypto";
import { appendFile, mkdir } from "fs/promises";
import * as path from "path";
import type { ProviderRequest, ProviderResponse } from "../adapters/llm";
import { LogWriteFailed, errorMessage, toStructuredError, type StructuredError } from "../errors";
import { sessionFileName } from "../utils/fs";
import { logger } from "./index";

export type RequestKind = "chat" | "compaction" | "classification";

export interface RequestLogRecord {
  id: string;
  /** ISO time the record was written. */
  timestamp: string;
  sessionId: string;
  kind: RequestKind;
  streamed: boolean;
  request: ProviderRequest;
  response?: ProviderResponse;
  error?: StructuredError;
  latencyMs: number;
}

export type RequestOutcome = { response: ProviderResponse } | { error: unknown };

export interface RecordMeta {
  kind: RequestKind;
  latencyMs: number;
  streamed?: boolean;
  /** Correlation id (e.g. the exchange id); generated when absent. */
  id?: string;
}

export interface IRequestLogger {
  /** Append one record. Never overwrites an earlier one. */
  record(sessionId: string, request: ProviderRequest, outcome: RequestOutcome, meta: RecordMeta): Promise<void>;
}

export function buildRecord(
  sessionId: string,
  request: ProviderRequest,
  outcome: RequestOutcome,
  meta: RecordMeta
): RequestLogRecord {
  const base = {
    id: meta.id ?? crypto.randomUUID(),
    timestamp: new Date().toISOString(),
    sessionId,
    kind: meta.kind,
    streamed: meta.streamed ?? false,
    request,
    latencyMs: Math.max(0, Math.round(meta.latencyMs)),
  };
  return "response" in outcome
    ? { ...base, response: outcome.response }
    : { ...base, error: toStructuredError(outcome.error) };
}

/** One JSON line per record in `<dir>/<sessionId>.jsonl`. */
export class JsonlRequestLogger implements IRequestLogger {
  private dirReady: Promise<string | undefined> | null = null;

  constructor(private readonly dir: string) {}

  filePath(sessionId: string): string {
    return path.join(this.dir, sessionFileName(sessionId, ".jsonl"));
  }

  async record(sessionId: string, request: ProviderRequest, outcome: RequestOutcome, meta: RecordMeta): Promise<void> {
    const rec = buildRecord(sessionId, request, outcome, meta);
    try {
      this.dirReady ??= mkdir(this.dir, { recursive: true });
      await this.dirReady;
      await appendFile(this.filePath(sessionId), JSON.stringify(rec) + "\n", "utf8");
    } catch (err) {
      this.dirReady = null;
      throw new LogWriteFailed(`request log write failed for session ${sessionId}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/** Keeps records in process (tests, or when file logging is disabled). */
export class MemoryRequestLogger implements IRequestLogger {
  readonly records: RequestLogRecord[] = [];

  async record(sessionId: string, request: ProviderRequest, outcome: RequestOutcome, meta: RecordMeta): Promise<void> {
    this.records.push(buildRecord(sessionId, request, outcome, meta));
  }

  forSession(sessionId: string): RequestLogRecord[] {
    return this.records.filter((r) => r.sessionId === sessionId);
  }
}

/** Writes started through recordSafely and not yet settled, per logger and session. */
const inFlight = new WeakMap<IRequestLogger, Map<string, Set<Promise<void>>>>();

/**
 * Fire-and-forget wrapper: the returned promise always resolves. A failed write becomes a
 * LOG_WRITE_FAILED warning and never reaches the exchange that produced the record.
 * The write stays visible to settleRequestLogs until it finishes.
 */
export function recordSafely(
  requestLogger: IRequestLogger,
  sessionId: string,
  request: ProviderRequest,
  outcome: RequestOutcome,
  meta: RecordMeta
): Promise<void> {
  let pending: Promise<void>;
  try {
    pending = requestLogger.record(sessionId, request, outcome, meta);
  } catch (err) {
    pending = Promise.reject(err);
  }
  const settled = pending.catch((err: unknown) => {
    const failure = err instanceof LogWriteFailed ? err : new LogWriteFailed(errorMessage(err), { cause: err });
    logger.warn(
      { event: "REQUEST_LOG_WRITE_FAILED", sessionId, kind: meta.kind, err: failure.message },
      "Request log write failed; exchange continues"
    );
  });

  let sessions = inFlight.get(requestLogger);
  if (!sessions) {
    sessions = new Map();
    inFlight.set(requestLogger, sessions);
  }
  const bySession = sessions;
  let writes = bySession.get(sessionId);
  if (!writes) {
    writes = new Set();
    bySession.set(sessionId, writes);
  }
  const owner = writes;
  const tracked = settled.finally(() => {
    owner.delete(tracked);
    if (owner.size === 0 && bySession.get(sessionId) === owner) bySession.delete(sessionId);
  });
  owner.add(tracked);
  return tracked;
}

/** Resolves once every write started through recordSafely on this logger (for one session, or all) has settled. */
export async function settleRequestLogs(requestLogger: IRequestLogger, sessionId?: string): Promise<void> {
  for (;;) {
    const sessions = inFlight.get(requestLogger);
    if (!sessions) return;
    const writes =
      sessionId !== undefined ? [...(sessions.get(sessionId) ?? [])] : [...sessions.values()].flatMap((set) => [...set]);
    if (writes.length === 0) return;
    await Promise.all(writes);
  }
}
