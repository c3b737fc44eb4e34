/**
 * Retrieval source factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IRetrievalSource } from "./types";
import { NoRetrievalSource } from "./none";
import { HttpRetrievalSource } from "./http";
import { OpenAIVectorStoreSource } from "./openai-vector-store";
import { logger } from "../../logging";

export type { IRetrievalSource, RetrievalSnippet } from "./types";
export { NoRetrievalSource } from "./none";
export { HttpRetrievalSource } from "./http";
export { OpenAIVectorStoreSource } from "./openai-vector-store";

export function createRetrievalSource(config: AppConfig): IRetrievalSource {
  const { provider, url, token, openaiApiKey, vectorStoreId } = config.retrieval;
  if (provider === "http" && url) {
    return new HttpRetrievalSource({ url, token });
  }
  if (provider === "openai-vector-store" && openaiApiKey && vectorStoreId) {
    return new OpenAIVectorStoreSource({ apiKey: openaiApiKey, vectorStoreId, baseUrl: config.llm.openaiBaseUrl });
  }
  if (provider !== "none") {
    logger.warn({ event: "RETRIEVAL_UNCONFIGURED", provider }, "Retrieval provider missing settings; retrieval disabled");
  }
  return new NoRetrievalSource();
}
