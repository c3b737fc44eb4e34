/**
 * In-memory session state: append-only transcript plus the current summary.
 * InMemorySessionStore keeps one SessionMemory per session id for the life of the process.
 */

import type { ISessionStore, MemorySummary, SessionSnapshot, Turn } from "./types";
import { summariesEqual } from "./types";

export class SessionMemory {
  private readonly turns: Turn[] = [];
  private summary: MemorySummary | null = null;
  private segmentStart = 0;
  readonly createdAt: number;

  constructor(readonly sessionId: string, init?: Partial<Omit<SessionSnapshot, "sessionId">>) {
    this.createdAt = init?.createdAt ?? Date.now();
    if (init?.turns) this.turns.push(...init.turns.map((t) => Object.freeze({ ...t })));
    this.summary = init?.summary ?? null;
    this.segmentStart = init?.segmentStart ?? 0;
  }

  append(turn: Turn): number {
    this.turns.push(Object.freeze({ ...turn }));
    return this.turns.length - 1;
  }

  getSnapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      createdAt: this.createdAt,
      turns: [...this.turns],
      summary: this.summary,
      segmentStart: this.segmentStart,
    };
  }

  /** Compare-and-swap: only replaces when the current summary equals `expected`. */
  replaceSummary(next: MemorySummary, expected: MemorySummary | null): boolean {
    if (!summariesEqual(this.summary, expected)) return false;
    if (next.coveredThrough >= this.turns.length) return false;
    this.summary = Object.freeze({ ...next });
    return true;
  }

  /** Returns whether the segment start moved. */
  markSegment(index: number): boolean {
    if (index < 0 || index >= this.turns.length || index <= this.segmentStart) return false;
    this.segmentStart = index;
    return true;
  }

  /** Independent copy; changes to it leave this session untouched. */
  clone(): SessionMemory {
    return new SessionMemory(this.sessionId, this.getSnapshot());
  }
}

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, SessionMemory>();

  async load(sessionId: string): Promise<SessionSnapshot | undefined> {
    return this.sessions.get(sessionId)?.getSnapshot();
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<number> {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new SessionMemory(sessionId);
      this.sessions.set(sessionId, session);
    }
    return session.append(turn);
  }

  async replaceSummary(sessionId: string, next: MemorySummary, expected: MemorySummary | null): Promise<boolean> {
    return this.sessions.get(sessionId)?.replaceSummary(next, expected) ?? false;
  }

  async markSegment(sessionId: string, index: number): Promise<void> {
    this.sessions.get(sessionId)?.markSegment(index);
  }
}
