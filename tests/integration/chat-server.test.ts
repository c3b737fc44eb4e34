/**
 * Integration tests for the HTTP chat interface on an ephemeral localhost port.
 */

import type { Server } from "http";
import { StubLLM } from "../../src/adapters/llm";
import { InvalidPrompt, ProviderRejected, ProviderTimeout, ProviderUnavailable } from "../../src/errors";
import { createChatServer, statusForError } from "../../src/server/chat-server";
import { closeServer, listenLocal } from "../helpers/net";
import { createTestRelay } from "../helpers/relay";

interface Running {
  server: Server;
  baseUrl: string;
}

async function start(llm: StubLLM): Promise<Running> {
  const { orchestrator } = createTestRelay({ llm });
  const server = createChatServer(orchestrator);
  return { server, baseUrl: await listenLocal(server) };
}

function postChat(baseUrl: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/chat`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

function parseSse(raw: string): Array<Record<string, unknown>> {
  return raw
    .split("\n\n")
    .filter((block) => block.startsWith("data: "))
    .map((block) => JSON.parse(block.slice("data: ".length)));
}

describe("statusForError", () => {
  it.each([
    [new InvalidPrompt("x"), 400],
    [new ProviderRejected("x", "stub", 400), 502],
    [new ProviderUnavailable("x", "stub"), 503],
    [new ProviderTimeout(10, "stub"), 504],
    [new Error("x"), 500],
  ])("maps %p to %p", (err, status) => {
    expect(statusForError(err)).toBe(status);
  });
});

describe("chat server", () => {
  let running: Running;

  beforeAll(async () => {
    running = await start(new StubLLM({ reply: "Hi from stub", chunkSize: 4 }));
  });

  afterAll(async () => {
    await closeServer(running.server);
  });

  it("GET /health returns ok", async () => {
    const res = await fetch(`${running.baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await fetch(`${running.baseUrl}/nope`);
    expect(res.status).toBe(404);
  });

  it("POST /chat returns the reply as JSON", async () => {
    const res = await postChat(running.baseUrl, { session_id: "web-1", content: "Hello" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ session_id: "web-1", reply: "Hi from stub", model: "stub-model" });
  });

  it("rejects a body without content", async () => {
    const res = await postChat(running.baseUrl, { session_id: "web-1" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "INVALID_PROMPT" } });
  });

  it("rejects blank content and non-JSON bodies", async () => {
    expect((await postChat(running.baseUrl, { session_id: "web-1", content: "   " })).status).toBe(400);
    expect((await postChat(running.baseUrl, "{not json")).status).toBe(400);
  });

  it("streams server-sent events ending with done", async () => {
    const res = await postChat(running.baseUrl, { session_id: "web-2", content: "Hello", stream: true });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/event-stream");

    const events = parseSse(await res.text());
    const deltas = events.filter((e) => e.type === "delta").map((e) => e.text);
    expect(deltas).toEqual(["Hi f", "rom ", "stub"]);
    expect(events[events.length - 1]).toMatchObject({ type: "done", session_id: "web-2", reply: "Hi from stub" });
  });
});

describe("chat server errors", () => {
  it.each([
    ["rejected", new StubLLM({ error: new ProviderRejected("bad request", "stub", 400) }), 502, "PROVIDER_REJECTED"],
    ["unavailable", new StubLLM({ error: new ProviderUnavailable("down", "stub") }), 503, "PROVIDER_UNAVAILABLE"],
  ])("maps a %s provider to its status", async (_label, llm, status, code) => {
    const running = await start(llm);
    try {
      const res = await postChat(running.baseUrl, { session_id: "e", content: "hi" });
      expect(res.status).toBe(status);
      expect(await res.json()).toMatchObject({ error: { code } });
    } finally {
      await closeServer(running.server);
    }
  });

  it("returns 504 when the deadline passes", async () => {
    const running = await start(new StubLLM({ reply: "late", delayMs: 500 }));
    try {
      const res = await postChat(running.baseUrl, { session_id: "t", content: "hi", deadline_ms: 50 });
      expect(res.status).toBe(504);
      expect(await res.json()).toMatchObject({ error: { code: "PROVIDER_TIMEOUT" } });
    } finally {
      await closeServer(running.server);
    }
  });

  it("ends a failed stream with a truncated event", async () => {
    const error = new ProviderUnavailable("connection reset", "stub");
    const running = await start(new StubLLM({ reply: "abcdef", chunkSize: 2, failAfterChunks: { count: 1, error } }));
    try {
      const res = await postChat(running.baseUrl, { session_id: "st", content: "hi", stream: true });
      const events = parseSse(await res.text());
      expect(events).toEqual([
        { type: "delta", text: "ab" },
        {
          type: "truncated",
          session_id: "st",
          partial_text: "ab",
          error: { code: "PROVIDER_UNAVAILABLE", name: "ProviderUnavailable", message: "connection reset" },
        },
      ]);
    } finally {
      await closeServer(running.server);
    }
  });
});
