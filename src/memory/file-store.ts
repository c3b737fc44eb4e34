/**
 * File-backed session store: one JSON document per session under `dir`.
 * Every mutation rewrites the document through a temp file + rename, so a summary replacement
 * is never observed half-written and survives a restart. In-memory state changes only after
 * the write has succeeded.
 */

import { readFile } from "fs/promises";
import * as path from "path";
import { z } from "zod";
import type { ISessionStore, MemorySummary, SessionSnapshot, Turn } from "./types";
import { SessionMemory } from "./session";
import { sessionFileName, writeFileAtomic } from "../utils/fs";
import { logger } from "../logging";
import { KeyedMutex } from "../pipeline/session-lock";

const SnippetSchema = z.object({
  text: z.string(),
  score: z.number(),
  source: z.string(),
});

const TurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.number(),
  snippets: z.array(SnippetSchema).optional(),
});

const SummarySchema = z.object({
  text: z.string(),
  coveredThrough: z.number().int().nonnegative(),
  coveredUntil: z.number(),
  updatedAt: z.number(),
});

const SessionDocumentSchema = z.object({
  sessionId: z.string(),
  createdAt: z.number(),
  turns: z.array(TurnSchema),
  summary: SummarySchema.nullable(),
  segmentStart: z.number().int().nonnegative().default(0),
});

type SessionDocument = z.infer<typeof SessionDocumentSchema>;

export interface FileSessionStoreConfig {
  dir: string;
  /** Sessions kept in memory between requests; older ones are read back from disk (default 1000). */
  maxCachedSessions?: number;
}

const DEFAULT_MAX_CACHED_SESSIONS = 1_000;

export class FileSessionStore implements ISessionStore {
  private readonly cache = new Map<string, SessionMemory>();
  /** Mutations of one session run one at a time, in call order. */
  private readonly locks = new KeyedMutex();
  private readonly maxCached: number;

  constructor(private readonly config: FileSessionStoreConfig) {
    this.maxCached = Math.max(1, config.maxCachedSessions ?? DEFAULT_MAX_CACHED_SESSIONS);
  }

  filePath(sessionId: string): string {
    return path.join(this.config.dir, sessionFileName(sessionId, ".json"));
  }

  /** Number of sessions currently held in memory. */
  get cachedSessions(): number {
    return this.cache.size;
  }

  async load(sessionId: string): Promise<SessionSnapshot | undefined> {
    return (await this.open(sessionId))?.getSnapshot();
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<number> {
    let index = -1;
    await this.update(
      sessionId,
      (draft) => {
        index = draft.append(turn);
        return true;
      },
      true
    );
    return index;
  }

  async replaceSummary(sessionId: string, next: MemorySummary, expected: MemorySummary | null): Promise<boolean> {
    return this.update(sessionId, (draft) => draft.replaceSummary(next, expected));
  }

  async markSegment(sessionId: string, index: number): Promise<void> {
    await this.update(sessionId, (draft) => draft.markSegment(index));
  }

  /**
   * Apply `change` to a copy of the session, write the copy, then make it current.
   * When the write fails the session keeps its previous state and the error propagates.
   * Returns false when the session is unknown (and `create` is off) or `change` made no change.
   */
  private update(sessionId: string, change: (draft: SessionMemory) => boolean, create = false): Promise<boolean> {
    return this.locks.runExclusive(sessionId, async () => {
      const current = await this.open(sessionId);
      if (!current && !create) return false;
      const draft = current ? current.clone() : new SessionMemory(sessionId);
      if (!change(draft)) return false;
      await this.persist(draft);
      this.remember(draft);
      return true;
    });
  }

  private async open(sessionId: string): Promise<SessionMemory | undefined> {
    const cached = this.cache.get(sessionId);
    if (cached) {
      this.remember(cached);
      return cached;
    }
    const doc = await this.readDocument(sessionId);
    if (!doc) return undefined;
    // Another call may have loaded or changed it while we were reading.
    const raced = this.cache.get(sessionId);
    if (raced) return raced;
    const session = new SessionMemory(sessionId, {
      createdAt: doc.createdAt,
      turns: doc.turns,
      summary: doc.summary,
      segmentStart: doc.segmentStart,
    });
    this.remember(session);
    return session;
  }

  /** Mark as most recently used; evict the least recently used sessions nobody is mutating. */
  private remember(session: SessionMemory): void {
    this.cache.delete(session.sessionId);
    this.cache.set(session.sessionId, session);
    for (const id of this.cache.keys()) {
      if (this.cache.size <= this.maxCached) break;
      if (id !== session.sessionId && !this.locks.isLocked(id)) this.cache.delete(id);
    }
  }

  private async readDocument(sessionId: string): Promise<SessionDocument | undefined> {
    const filePath = this.filePath(sessionId);
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    const parsed = SessionDocumentSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid session document ${filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async persist(session: SessionMemory): Promise<void> {
    const snapshot = session.getSnapshot();
    const doc: SessionDocument = {
      sessionId: snapshot.sessionId,
      createdAt: snapshot.createdAt,
      turns: snapshot.turns.map((t) => ({ ...t, snippets: t.snippets ? [...t.snippets] : undefined })),
      summary: snapshot.summary,
      segmentStart: snapshot.segmentStart,
    };
    await writeFileAtomic(this.filePath(session.sessionId), JSON.stringify(doc, null, 2));
    logger.debug({ event: "SESSION_PERSISTED", sessionId: session.sessionId, turns: doc.turns.length }, "Session persisted");
  }
}

/** Matches on shape: fs errors may come from another realm and fail `instanceof Error`. */
function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
