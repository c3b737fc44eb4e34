import type { IRetrievalSource, RetrievalSnippet } from "./types";

/** No retrieval configured: every query has no context. */
export class NoRetrievalSource implements IRetrievalSource {
  readonly name = "none";

  async search(_query: string, _topK: number): Promise<RetrievalSnippet[]> {
    return [];
  }
}
