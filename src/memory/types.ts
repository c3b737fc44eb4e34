/**
 * Session memory types.
 * Append-only transcript + a single rolling summary of everything up to its coverage boundary.
 */

import type { RetrievalSnippet } from "../adapters/retrieval";

export type TurnRole = "user" | "assistant";

/** Immutable once appended; insertion order is the conversation. */
export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: number;
  /** Snippets retrieved for this (user) turn. */
  readonly snippets?: readonly RetrievalSnippet[];
}

export interface MemorySummary {
  readonly text: string;
  /** Index of the last turn folded into this summary. */
  readonly coveredThrough: number;
  /** Timestamp of that turn. */
  readonly coveredUntil: number;
  readonly updatedAt: number;
}

export interface SessionSnapshot {
  readonly sessionId: string;
  readonly createdAt: number;
  readonly turns: readonly Turn[];
  readonly summary: MemorySummary | null;
  /** Index of the first turn of the current topic segment (0 until a topic shift). */
  readonly segmentStart: number;
}

/**
 * Session/memory persistence boundary.
 * Sessions are created by their first appended turn and never deleted here.
 */
export interface ISessionStore {
  load(sessionId: string): Promise<SessionSnapshot | undefined>;

  /** Append a turn; returns its index. */
  appendTurn(sessionId: string, turn: Turn): Promise<number>;

  /**
   * Atomically replace the summary if the stored one still equals `expected`.
   * Returns false (and changes nothing) on mismatch or unknown session.
   */
  replaceSummary(sessionId: string, next: MemorySummary, expected: MemorySummary | null): Promise<boolean>;

  /** Record that a new topic segment starts at turn `index`. */
  markSegment(sessionId: string, index: number): Promise<void>;
}

export function summariesEqual(a: MemorySummary | null, b: MemorySummary | null): boolean {
  if (a === null || b === null) return a === b;
  return (
    a.text === b.text &&
    a.coveredThrough === b.coveredThrough &&
    a.coveredUntil === b.coveredUntil &&
    a.updatedAt === b.updatedAt
  );
}
