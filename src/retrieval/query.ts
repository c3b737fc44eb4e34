/**
 * Retrieval query for a turn. A short follow-up ("and tomatoes?") is blended with the previous
 * user question so the search keeps the conversation's subject.
 */

import type { ContinuityLabel } from "../memory/continuity";
import type { Turn } from "../memory/types";

export const SHORT_FOLLOWUP_CHARS = 80;
export const MAX_QUERY_CHARS = 1_200;
/** Shorter earlier messages ("ok", "thanks") carry no subject worth blending. */
const MIN_ANCHOR_CHARS = 12;

const CODE_LIKE = /[{}[\]();=<>]|\b(def|class|import|function|return|const|let)\b/;

export function isShortFollowUp(content: string, maxChars = SHORT_FOLLOWUP_CHARS): boolean {
  const t = content.trim();
  return t.length > 0 && t.length <= maxChars && !CODE_LIKE.test(t);
}

/** Most recent user turn long enough to name a subject. */
export function lastUserQuery(history: readonly Turn[]): string | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const t = history[i];
    const content = t.content.trim();
    if (t.role === "user" && content.length >= MIN_ANCHOR_CHARS) return content;
  }
  return undefined;
}

export function retrievalQuery(content: string, history: readonly Turn[], label: ContinuityLabel): string {
  const t = content.trim();
  if (label !== "continue" || !isShortFollowUp(t)) return t;
  const anchor = lastUserQuery(history);
  if (!anchor) return t;
  return `${anchor} ${t}`.slice(0, MAX_QUERY_CHARS);
}
