/**
 * Unit tests for JSON extraction and file helpers.
 */

import { z } from "zod";
import { sessionFileName } from "../../../src/utils/fs";
import { extractJson, scanJsonObjects, stripCodeFences } from "../../../src/utils/json";

const A = z.object({ a: z.number() });

describe("extractJson", () => {
  it("reads fenced JSON", () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(extractJson('```json\n{"a": 1}\n```', A)).toEqual({ a: 1 });
  });

  it("finds an object inside prose", () => {
    expect(extractJson('Sure: {"a": 2} hope that helps', A)).toEqual({ a: 2 });
  });

  it("returns the first candidate that matches the schema", () => {
    expect(extractJson('{"b": 1} then {"a": 3}', A)).toEqual({ a: 3 });
  });

  it("returns null when nothing matches", () => {
    expect(extractJson("no json here", A)).toBeNull();
    expect(extractJson('{"a": "not a number"}', A)).toBeNull();
  });
});

describe("scanJsonObjects", () => {
  it("ignores braces inside strings", () => {
    expect(scanJsonObjects('x {"t": "}{"} y')).toEqual(['{"t": "}{"}']);
  });

  it("returns outermost objects only", () => {
    expect(scanJsonObjects('{"o": {"i": 1}} {"n": 2}')).toEqual(['{"o": {"i": 1}}', '{"n": 2}']);
  });
});

it("sessionFileName encodes path separators", () => {
  expect(sessionFileName("a/b", ".json")).toBe("a%2Fb.json");
  expect(sessionFileName("plain", ".jsonl")).toBe("plain.jsonl");
});
