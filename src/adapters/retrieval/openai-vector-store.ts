/**
 * OpenAI vector store (file search) retrieval source.
 */

import OpenAI from "openai";
import type { IRetrievalSource, RetrievalSnippet } from "./types";

export interface OpenAIVectorStoreConfig {
  apiKey: string;
  vectorStoreId: string;
  baseUrl?: string;
}

export class OpenAIVectorStoreSource implements IRetrievalSource {
  readonly name = "openai-vector-store";
  private client: OpenAI;

  constructor(private readonly config: OpenAIVectorStoreConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  }

  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalSnippet[]> {
    const page = await this.client.vectorStores.search(
      this.config.vectorStoreId,
      { query, max_num_results: topK },
      { signal }
    );
    return page.data.map((hit) => ({
      text: hit.content.map((c) => c.text).join("\n"),
      score: hit.score,
      source: hit.filename || hit.file_id,
    }));
  }
}
