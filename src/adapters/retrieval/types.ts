/**
 * Retrieval source types.
 * A source returns ranked snippets for a query; the vector store or search backend behind it is pluggable.
 */

export interface RetrievalSnippet {
  readonly text: string;
  /** Higher is more relevant. */
  readonly score: number;
  /** Document or file the snippet came from. */
  readonly source: string;
}

export interface IRetrievalSource {
  readonly name: string;
  search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalSnippet[]>;
}
