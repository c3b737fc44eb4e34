/**
 * Continuity classification: does a new user turn continue the current topic or start a new one?
 *
 * Biased toward "continue": a false new_topic finalizes memory early, so every uncertain case,
 * every error, and every new_topic below the confidence threshold comes out as continue.
 */

import { z } from "zod";
import type { ILLM, ProviderRequest } from "../adapters/llm";
import { Deadline } from "../adapters/llm";
import { errorMessage } from "../errors";
import { logger } from "../logging";
import { recordSafely, type IRequestLogger, type RequestOutcome } from "../logging/request-log";
import { extractJson } from "../utils/json";
import type { Turn } from "./types";
import stopwordList from "./stopwords.json";

export type ContinuityLabel = "continue" | "new_topic";

export interface ClassificationResult {
  label: ContinuityLabel;
  /** 0..1, confidence in the raw decision before thresholding. */
  confidence: number;
  reason: string;
}

export interface ClassifyContext {
  sessionId?: string;
}

export interface IContinuityClassifier {
  classify(newTurnContent: string, recentTurns: readonly Turn[], context?: ClassifyContext): Promise<ClassificationResult>;
}

const DEFAULT_THRESHOLD = 0.7;
const RECENT_TURNS_CONSIDERED = 6;

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const SHIFT_PHRASES = [
  "new topic",
  "different topic",
  "change of subject",
  "change the subject",
  "changing the subject",
  "unrelated question",
  "unrelated note",
  "switching gears",
  "on another note",
  "on a different note",
  "something else entirely",
  "let's talk about something else",
];

const CONTINUATION_CUE = /^(and|also|but|so|then|what about|how about|why|ok|okay|yes|no|thanks|thank you|it|that|this|those|these|they|them|he|she)\b/;

export function contentWords(text: string): Set<string> {
  const words = text.toLowerCase().match(/[a-z0-9']+/g) ?? [];
  return new Set(words.map((w) => w.replace(/^'+|'+$/g, "")).filter((w) => w.length >= 3 && !STOPWORDS.has(w)));
}

/** new_topic below the threshold is treated as continue. */
export function applyThreshold(result: ClassificationResult, threshold: number): ClassificationResult {
  if (result.label === "new_topic" && result.confidence < threshold) {
    return { label: "continue", confidence: result.confidence, reason: `${result.reason}; below threshold` };
  }
  return result;
}

export interface HeuristicClassifierConfig {
  threshold?: number;
}

/** Cheap lexical classifier: explicit cues first, then word overlap with the recent turns. */
export class HeuristicContinuityClassifier implements IContinuityClassifier {
  private readonly threshold: number;

  constructor(config: HeuristicClassifierConfig = {}) {
    this.threshold = config.threshold ?? DEFAULT_THRESHOLD;
  }

  async classify(newTurnContent: string, recentTurns: readonly Turn[]): Promise<ClassificationResult> {
    return applyThreshold(this.decide(newTurnContent, recentTurns), this.threshold);
  }

  private decide(newTurnContent: string, recentTurns: readonly Turn[]): ClassificationResult {
    const recent = recentTurns.slice(-RECENT_TURNS_CONSIDERED);
    if (recent.length === 0) return { label: "continue", confidence: 1, reason: "no history" };

    const text = newTurnContent.trim().toLowerCase();
    if (SHIFT_PHRASES.some((p) => text.includes(p))) {
      return { label: "new_topic", confidence: 0.9, reason: "explicit topic shift" };
    }
    if (CONTINUATION_CUE.test(text)) {
      return { label: "continue", confidence: 0.9, reason: "continuation cue" };
    }

    const words = contentWords(text);
    if (words.size === 0) return { label: "continue", confidence: 0.6, reason: "no content words" };

    const history = contentWords(recent.map((t) => t.content).join(" "));
    let overlap = 0;
    for (const w of words) if (history.has(w)) overlap++;
    if (overlap > 0) {
      return { label: "continue", confidence: 0.5 + Math.min(0.45, overlap / words.size), reason: "shared vocabulary" };
    }
    if (words.size >= 3) {
      return { label: "new_topic", confidence: Math.min(0.85, 0.5 + 0.07 * words.size), reason: "no shared vocabulary" };
    }
    return { label: "continue", confidence: 0.55, reason: "too short to judge" };
  }
}

const ClassificationSchema = z.object({
  label: z.enum(["continue", "new_topic"]),
  confidence: z.number().min(0).max(1),
});

const CLASSIFIER_SYSTEM_PROMPT =
  "You decide whether the newest user message continues the current conversation topic or starts a new, unrelated one. " +
  'Reply with JSON only: {"label": "continue" | "new_topic", "confidence": number between 0 and 1}. ' +
  "Follow-up questions, clarifications and references to earlier messages are continue.";

export interface LlmClassifierConfig {
  threshold?: number;
  timeoutMs?: number;
  model?: string;
  requestLogger?: IRequestLogger;
}

/** Asks the provider; fails open to continue on any error or unusable output. */
export class LlmContinuityClassifier implements IContinuityClassifier {
  private readonly threshold: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly llm: ILLM,
    private readonly config: LlmClassifierConfig = {}
  ) {
    this.threshold = config.threshold ?? DEFAULT_THRESHOLD;
    this.timeoutMs = config.timeoutMs ?? 10_000;
  }

  async classify(newTurnContent: string, recentTurns: readonly Turn[], context: ClassifyContext = {}): Promise<ClassificationResult> {
    const recent = recentTurns.slice(-RECENT_TURNS_CONSIDERED);
    if (recent.length === 0) return { label: "continue", confidence: 1, reason: "no history" };

    const transcript = recent.map((t) => `${t.role}: ${t.content}`).join("\n");
    const request: ProviderRequest = {
      model: this.config.model ?? this.llm.defaultModel,
      messages: [
        { role: "system", content: CLASSIFIER_SYSTEM_PROMPT },
        { role: "user", content: `Recent turns:\n${transcript}\n\nNewest user message:\n${newTurnContent.trim()}` },
      ],
      params: { temperature: 0, maxTokens: 60 },
    };
    const deadline = new Deadline(this.timeoutMs, this.llm.name);
    const start = Date.now();
    try {
      const response = await deadline.race(this.llm.complete(request, { signal: deadline.signal }));
      this.log(context.sessionId, request, { response }, start);
      const parsed = extractJson(response.text, ClassificationSchema);
      if (!parsed) {
        logger.warn({ event: "CONTINUITY_UNPARSEABLE", sessionId: context.sessionId }, "Classifier output unusable; assuming continue");
        return { label: "continue", confidence: 0, reason: "unparseable classifier output" };
      }
      return applyThreshold({ ...parsed, reason: "model" }, this.threshold);
    } catch (err) {
      this.log(context.sessionId, request, { error: err }, start);
      logger.warn(
        { event: "CONTINUITY_FAILED", sessionId: context.sessionId, err: errorMessage(err) },
        "Continuity classification failed; assuming continue"
      );
      return { label: "continue", confidence: 0, reason: "classifier error" };
    } finally {
      deadline.clear();
    }
  }

  private log(sessionId: string | undefined, request: ProviderRequest, outcome: RequestOutcome, start: number): void {
    if (!sessionId || !this.config.requestLogger) return;
    void recordSafely(this.config.requestLogger, sessionId, request, outcome, {
      kind: "classification",
      latencyMs: Date.now() - start,
    });
  }
}
