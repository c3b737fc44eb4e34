import type { Message } from "../adapters/llm";
import type { RetrievalSnippet } from "../adapters/retrieval";
import type { MemorySummary, Turn } from "../memory/types";
import type { MergedRetrieval, RetrievalMerger } from "../retrieval/merger";

export interface ContextBuilderConfig {
  systemPrompt: string;
  /** Characters of the whole context: system message (prompt, summary, retrieval) plus turns. */
  budgetChars: number;
  /** Minimum number of most recent turns sent verbatim, even when already summarized. */
  recentTurns: number;
}

export interface ContextInput {
  /** Full transcript, newest user turn last. */
  turns: readonly Turn[];
  summary: MemorySummary | null;
  snippets: readonly RetrievalSnippet[];
  /** First turn of the current topic segment (0 when there has been no topic shift). */
  segmentStart?: number;
}

export interface BuiltContext {
  messages: Message[];
  retrieval: MergedRetrieval;
  /** Index of the first turn sent verbatim. */
  windowStart: number;
  /** Active turns left out because memory alone exceeded the budget. */
  droppedTurns: number;
}

const SUMMARY_HEADER = "\n\nConversation summary:\n";
const RETRIEVAL_HEADER = "\n\nRelevant context:\n";

/**
 * First turn of the active window: after the coverage boundary, but never fewer than `recentTurns`.
 * Once the summary covers everything before the current topic segment, earlier turns are left to
 * the summary even if that means fewer than `recentTurns`.
 */
export function activeWindowStart(
  turnCount: number,
  summary: MemorySummary | null,
  recentTurns: number,
  segmentStart = 0
): number {
  const afterSummary = summary ? summary.coveredThrough + 1 : 0;
  const start = Math.max(0, Math.min(afterSummary, turnCount - recentTurns));
  if (segmentStart > 0 && afterSummary >= segmentStart) return Math.min(Math.max(start, segmentStart), turnCount);
  return start;
}

/**
 * ContextBuilder
 *
 * Assembles the provider messages for one exchange: system prompt, conversation summary and
 * retrieved context in the system message, then the active window of turns. Memory (with the
 * system prompt) is budgeted first; retrieval gets what is left. Only the system prompt, the summary
 * and the newest turn can push the total past the budget.
 */
export class ContextBuilder {
  constructor(
    private readonly merger: RetrievalMerger,
    private readonly config: ContextBuilderConfig
  ) {}

  build(input: ContextInput): BuiltContext {
    const { turns, summary } = input;
    const windowStart = activeWindowStart(turns.length, summary, this.config.recentTurns, input.segmentStart);
    let system = this.config.systemPrompt;
    if (summary) system += SUMMARY_HEADER + summary.text;

    let start = windowStart;
    let memoryCost = system.length + turns.slice(start).reduce((n, t) => n + t.content.length, 0);
    // Oldest turns go first; the newest user turn always stays.
    while (memoryCost > this.config.budgetChars && start < turns.length - 1) {
      memoryCost -= turns[start].content.length;
      start++;
    }

    const retrieval = this.merger.merge(
      input.snippets,
      Math.max(0, this.config.budgetChars - memoryCost - RETRIEVAL_HEADER.length)
    );
    if (retrieval.text) system += RETRIEVAL_HEADER + retrieval.text;

    return {
      messages: [
        { role: "system", content: system },
        ...turns.slice(start).map((t): Message => ({ role: t.role, content: t.content })),
      ],
      retrieval,
      windowStart: start,
      droppedTurns: start - windowStart,
    };
  }
}
