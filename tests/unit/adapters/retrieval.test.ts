/**
 * Unit tests for retrieval sources (factory and HTTP source against a local server).
 */

import * as http from "http";
import {
  HttpRetrievalSource,
  NoRetrievalSource,
  OpenAIVectorStoreSource,
  createRetrievalSource,
} from "../../../src/adapters/retrieval";
import { loadConfig } from "../../../src/config";
import { closeServer, listenLocal } from "../../helpers/net";

describe("createRetrievalSource", () => {
  it("returns NoRetrievalSource by default", () => {
    expect(createRetrievalSource(loadConfig({}))).toBeInstanceOf(NoRetrievalSource);
  });

  it("returns HttpRetrievalSource when a URL is set", () => {
    const source = createRetrievalSource(loadConfig({ RETRIEVAL_PROVIDER: "http", RETRIEVAL_URL: "http://127.0.0.1:9/search" }));
    expect(source).toBeInstanceOf(HttpRetrievalSource);
  });

  it("disables retrieval when the HTTP source has no URL", () => {
    expect(createRetrievalSource(loadConfig({ RETRIEVAL_PROVIDER: "http" }))).toBeInstanceOf(NoRetrievalSource);
  });

  it("returns OpenAIVectorStoreSource with key and store id", () => {
    const source = createRetrievalSource(
      loadConfig({ RETRIEVAL_PROVIDER: "openai-vector-store", OPENAI_API_KEY: "test-key", OPENAI_VECTOR_STORE_ID: "vs_test" })
    );
    expect(source).toBeInstanceOf(OpenAIVectorStoreSource);
  });
});

it("NoRetrievalSource always returns an empty list", async () => {
  await expect(new NoRetrievalSource().search("q", 5)).resolves.toEqual([]);
});

describe("HttpRetrievalSource", () => {
  let server: http.Server;
  let url: string;
  const received: Array<{ body: unknown; auth: string | undefined }> = [];
  let status = 200;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (c: Buffer) => chunks.push(c));
      req.on("end", () => {
        received.push({ body: JSON.parse(Buffer.concat(chunks).toString("utf8")), auth: req.headers.authorization });
        res.writeHead(status, { "Content-Type": "application/json" });
        res.end(
          JSON.stringify({
            results: [
              { text: "Snippet one", score: 0.8, source: "kb/1" },
              { text: "No score" },
              { score: 0.9, source: "missing text" },
            ],
          })
        );
      });
    });
    url = `${await listenLocal(server)}/search`;
  });

  afterAll(async () => {
    await closeServer(server);
  });

  beforeEach(() => {
    received.length = 0;
    status = 200;
  });

  it("posts the query and parses results", async () => {
    const source = new HttpRetrievalSource({ url, token: "test-token" });
    const snippets = await source.search("where is it", 3);
    expect(received).toEqual([{ body: { query: "where is it", top_k: 3 }, auth: "Bearer test-token" }]);
    expect(snippets).toEqual([
      { text: "Snippet one", score: 0.8, source: "kb/1" },
      { text: "No score", score: 0, source: "unknown" },
    ]);
  });

  it("throws on a non-2xx response", async () => {
    status = 500;
    await expect(new HttpRetrievalSource({ url }).search("q", 1)).rejects.toThrow(/500/);
    expect(received[0].auth).toBeUndefined();
  });
});
