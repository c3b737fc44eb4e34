/**
 * Unit tests for the request log.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { ProviderRequest } from "../../../src/adapters/llm";
import { LogWriteFailed, ProviderRejected } from "../../../src/errors";
import {
  JsonlRequestLogger,
  MemoryRequestLogger,
  buildRecord,
  recordSafely,
  type IRequestLogger,
} from "../../../src/logging/request-log";

const request: ProviderRequest = {
  model: "stub-model",
  messages: [{ role: "user", content: "Hi" }],
  params: { temperature: 0.2 },
};
const response = { text: "Hello", model: "stub-model" };

describe("buildRecord", () => {
  it("records a response", () => {
    const rec = buildRecord("s1", request, { response }, { kind: "chat", latencyMs: 12.6, id: "ex-1" });
    expect(rec).toMatchObject({ id: "ex-1", sessionId: "s1", kind: "chat", streamed: false, request, response, latencyMs: 13 });
    expect(rec.error).toBeUndefined();
    expect(Number.isNaN(Date.parse(rec.timestamp))).toBe(false);
  });

  it("records a structured error", () => {
    const rec = buildRecord("s1", request, { error: new ProviderRejected("bad", "openai", 400) }, { kind: "chat", latencyMs: 5 });
    expect(rec.error).toEqual({ code: "PROVIDER_REJECTED", name: "ProviderRejected", message: "bad", status: 400 });
    expect(rec.response).toBeUndefined();
    expect(rec.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("JsonlRequestLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-requests-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per record", async () => {
    const logger = new JsonlRequestLogger(path.join(dir, "logs"));
    await logger.record("user/1", request, { response }, { kind: "chat", latencyMs: 1, id: "a" });
    await logger.record("user/1", request, { response }, { kind: "compaction", latencyMs: 2, id: "b" });

    const file = path.join(dir, "logs", "user%2F1.jsonl");
    expect(logger.filePath("user/1")).toBe(file);
    const lines = fs.readFileSync(file, "utf8").trim().split("\n");
    expect(lines.map((l) => JSON.parse(l).id)).toEqual(["a", "b"]);
    expect(JSON.parse(lines[1]).kind).toBe("compaction");
  });

  it("throws LogWriteFailed when the directory cannot be created", async () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "not a directory");
    const logger = new JsonlRequestLogger(path.join(blocker, "logs"));
    await expect(logger.record("s1", request, { response }, { kind: "chat", latencyMs: 1 })).rejects.toBeInstanceOf(LogWriteFailed);
  });
});

describe("MemoryRequestLogger", () => {
  it("filters by session", async () => {
    const logger = new MemoryRequestLogger();
    await logger.record("a", request, { response }, { kind: "chat", latencyMs: 1 });
    await logger.record("b", request, { response }, { kind: "chat", latencyMs: 1 });
    expect(logger.records).toHaveLength(2);
    expect(logger.forSession("b").map((r) => r.sessionId)).toEqual(["b"]);
  });
});

describe("recordSafely", () => {
  it("swallows asynchronous failures", async () => {
    const failing: IRequestLogger = {
      record: async () => {
        throw new Error("disk full");
      },
    };
    await expect(recordSafely(failing, "s1", request, { response }, { kind: "chat", latencyMs: 1 })).resolves.toBeUndefined();
  });

  it("swallows synchronous failures", async () => {
    const failing: IRequestLogger = {
      record: () => {
        throw new Error("broken");
      },
    };
    await expect(recordSafely(failing, "s1", request, { response }, { kind: "chat", latencyMs: 1 })).resolves.toBeUndefined();
  });
});
