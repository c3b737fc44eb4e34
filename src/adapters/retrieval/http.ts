/**
 * HTTP retrieval source.
 * POST <url> { query, top_k } -> { results: [{ text, score, source }] }.
 */

import { z } from "zod";
import type { IRetrievalSource, RetrievalSnippet } from "./types";

export interface HttpRetrievalConfig {
  url: string;
  /** Optional bearer token for the search service. */
  token?: string;
}

const RawSnippetSchema = z.object({
  text: z.string(),
  score: z.unknown().optional(),
  source: z.unknown().optional(),
});

const SearchResponseSchema = z.object({ results: z.array(z.unknown()) });

function toSnippet(raw: unknown): RetrievalSnippet | null {
  const parsed = RawSnippetSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  const score = typeof r.score === "number" && Number.isFinite(r.score) ? r.score : 0;
  const source = typeof r.source === "string" ? r.source : "unknown";
  return { text: r.text, score, source };
}

export class HttpRetrievalSource implements IRetrievalSource {
  readonly name = "http";

  constructor(private readonly config: HttpRetrievalConfig) {}

  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalSnippet[]> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.token) headers.Authorization = `Bearer ${this.config.token}`;
    const response = await fetch(this.config.url, {
      method: "POST",
      headers,
      body: JSON.stringify({ query, top_k: topK }),
      signal,
    });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Retrieval POST ${this.config.url}: ${response.status} ${text}`);
    }
    const body = SearchResponseSchema.safeParse(await response.json());
    const results = body.success ? body.data.results : [];
    const snippets: RetrievalSnippet[] = [];
    for (const raw of results) {
      const s = toSnippet(raw);
      if (s) snippets.push(s);
    }
    return snippets;
  }
}
