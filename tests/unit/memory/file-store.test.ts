/**
 * Unit tests for the JSON-file session store.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { StubLLM } from "../../../src/adapters/llm";
import { FileSessionStore } from "../../../src/memory/file-store";
import { MemoryOptimizer } from "../../../src/memory/optimizer";
import { turn } from "../../helpers/relay";

describe("FileSessionStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-sessions-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns undefined for a session with no document", async () => {
    await expect(new FileSessionStore({ dir }).load("nobody")).resolves.toBeUndefined();
  });

  it("persists turns, summary and segment across instances", async () => {
    const store = new FileSessionStore({ dir });
    await store.appendTurn("s1", turn("user", "Hello", 1_000));
    await store.appendTurn("s1", turn("assistant", "Hi", 2_000));
    await store.appendTurn("s1", turn("user", "Other thing", 3_000));
    const summary = { text: "Greetings exchanged.", coveredThrough: 1, coveredUntil: 2_000, updatedAt: 4_000 };
    await expect(store.replaceSummary("s1", summary, null)).resolves.toBe(true);
    await store.markSegment("s1", 2);

    const reopened = await new FileSessionStore({ dir }).load("s1");
    expect(reopened?.turns).toEqual([
      { role: "user", content: "Hello", timestamp: 1_000 },
      { role: "assistant", content: "Hi", timestamp: 2_000 },
      { role: "user", content: "Other thing", timestamp: 3_000 },
    ]);
    expect(reopened?.summary).toEqual(summary);
    expect(reopened?.segmentStart).toBe(2);
  });

  it("keeps retrieval snippets attached to turns", async () => {
    const store = new FileSessionStore({ dir });
    const snippets = [{ text: "fact", score: 0.7, source: "kb" }];
    await store.appendTurn("s1", { role: "user", content: "q", timestamp: 1, snippets });
    const reopened = await new FileSessionStore({ dir }).load("s1");
    expect(reopened?.turns[0].snippets).toEqual(snippets);
  });

  it("does not write a summary whose expected value is stale", async () => {
    const store = new FileSessionStore({ dir });
    await store.appendTurn("s1", turn("user", "a"));
    const current = { text: "v1", coveredThrough: 0, coveredUntil: 1_000, updatedAt: 1 };
    await store.replaceSummary("s1", current, null);
    const stale = { text: "v0", coveredThrough: 0, coveredUntil: 1_000, updatedAt: 0 };
    await expect(store.replaceSummary("s1", { ...current, text: "v2" }, stale)).resolves.toBe(false);
    expect((await new FileSessionStore({ dir }).load("s1"))?.summary?.text).toBe("v1");
  });

  it("encodes session ids into safe file names", async () => {
    const store = new FileSessionStore({ dir });
    await store.appendTurn("team/alpha", turn("user", "hi"));
    expect(store.filePath("team/alpha")).toBe(path.join(dir, "team%2Falpha.json"));
    expect(fs.existsSync(path.join(dir, "team%2Falpha.json"))).toBe(true);
  });

  it("rejects a malformed document", async () => {
    fs.writeFileSync(path.join(dir, "broken.json"), JSON.stringify({ sessionId: 3 }));
    await expect(new FileSessionStore({ dir }).load("broken")).rejects.toThrow(/Invalid session document/);
  });

  it("keeps the previous state in memory when a write fails", async () => {
    const store = new FileSessionStore({ dir });
    await store.appendTurn("s1", turn("user", "Hello", 1_000));
    await store.appendTurn("s1", turn("assistant", "Hi", 2_000));
    const file = store.filePath("s1");
    // A directory in place of the document makes the rename fail.
    fs.rmSync(file);
    fs.mkdirSync(file);

    const summary = { text: "Greetings.", coveredThrough: 1, coveredUntil: 2_000, updatedAt: 3_000 };
    await expect(store.replaceSummary("s1", summary, null)).rejects.toThrow();
    await expect(store.appendTurn("s1", turn("user", "Lost", 3_000))).rejects.toThrow();
    const snap = await store.load("s1");
    expect(snap?.summary).toBeNull();
    expect(snap?.turns.map((t) => t.content)).toEqual(["Hello", "Hi"]);
    expect(fs.readdirSync(dir)).toEqual(["s1.json"]);

    fs.rmdirSync(file);
    await store.appendTurn("s1", turn("user", "Back", 4_000));
    const reopened = await new FileSessionStore({ dir }).load("s1");
    expect(reopened?.summary).toBeNull();
    expect(reopened?.turns.map((t) => t.content)).toEqual(["Hello", "Hi", "Back"]);
  });

  it("reports a failed compaction without changing the summary", async () => {
    const store = new FileSessionStore({ dir });
    await store.appendTurn("s1", turn("user", "Hello", 1_000));
    await store.appendTurn("s1", turn("assistant", "Hi", 2_000));
    const file = store.filePath("s1");
    fs.rmSync(file);
    fs.mkdirSync(file);

    const optimizer = new MemoryOptimizer(store, new StubLLM({ reply: "Summary." }), { threshold: 1 });
    const outcome = await optimizer.optimize("s1");

    expect(outcome.status).toBe("failed");
    expect((await store.load("s1"))?.summary).toBeNull();
  });

  it("serializes a summary write with a concurrent append", async () => {
    const store = new FileSessionStore({ dir });
    await store.appendTurn("s1", turn("user", "a", 1));
    const summary = { text: "A.", coveredThrough: 0, coveredUntil: 1, updatedAt: 2 };
    const [replaced, index] = await Promise.all([
      store.replaceSummary("s1", summary, null),
      store.appendTurn("s1", turn("assistant", "b", 3)),
    ]);
    expect(replaced).toBe(true);
    expect(index).toBe(1);
    const reopened = await new FileSessionStore({ dir }).load("s1");
    expect(reopened?.summary).toEqual(summary);
    expect(reopened?.turns).toHaveLength(2);
  });

  it("bounds the in-memory cache and reads evicted sessions back from disk", async () => {
    const store = new FileSessionStore({ dir, maxCachedSessions: 2 });
    await store.appendTurn("a", turn("user", "from a"));
    await store.appendTurn("b", turn("user", "from b"));
    await store.appendTurn("c", turn("user", "from c"));
    expect(store.cachedSessions).toBe(2);
    expect((await store.load("a"))?.turns.map((t) => t.content)).toEqual(["from a"]);
    expect(store.cachedSessions).toBe(2);
  });
});
