/**
 * Pull a JSON object out of model output.
 *
 * Models wrap JSON in ```json fences, add prose around it, or emit several objects; we try each
 * candidate in order and let the caller validate with a schema.
 */

import type { z } from "zod";

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_m, inner: string) => inner.trim());
}

/** Balanced {...} blocks, outermost first, ignoring braces inside strings. */
export function scanJsonObjects(text: string): string[] {
  const out: string[] = [];
  for (let i = 0; i < text.length; i++) {
    if (text[i] !== "{") continue;
    let depth = 0;
    let inString = false;
    let escape = false;
    for (let j = i; j < text.length; j++) {
      const ch = text[j];
      if (inString) {
        if (escape) escape = false;
        else if (ch === "\\") escape = true;
        else if (ch === "\"") inString = false;
        continue;
      }
      if (ch === "\"") inString = true;
      else if (ch === "{") depth++;
      else if (ch === "}") depth--;
      if (depth === 0) {
        out.push(text.slice(i, j + 1));
        i = j;
        break;
      }
    }
  }
  return out;
}

/** First candidate that parses and satisfies the schema, or null. */
export function extractJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  const cleaned = stripCodeFences(text.trim());
  const candidates = [cleaned, ...scanJsonObjects(cleaned)];
  for (const candidate of candidates) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      continue;
    }
    const parsed = schema.safeParse(value);
    if (parsed.success) return parsed.data;
  }
  return null;
}
