/**
 * Unit tests for the error taxonomy.
 */

import {
  ProviderRejected,
  ProviderTimeout,
  ProviderUnavailable,
  RelayError,
  RetrievalUnavailable,
  asProviderError,
  providerErrorFromStatus,
  toStructuredError,
} from "../../src/errors";

describe("providerErrorFromStatus", () => {
  it("maps 4xx to ProviderRejected with the status", () => {
    const err = providerErrorFromStatus(400, "bad request", "openai");
    expect(err).toBeInstanceOf(ProviderRejected);
    expect(err).toMatchObject({ status: 400, provider: "openai", message: "bad request" });
  });

  it.each([408, 429, 500, 503, undefined])("maps %p to ProviderUnavailable", (status) => {
    expect(providerErrorFromStatus(status, "x", "anthropic")).toBeInstanceOf(ProviderUnavailable);
  });
});

describe("asProviderError", () => {
  it("passes provider errors through", () => {
    const err = new ProviderTimeout(1_000, "openai");
    expect(asProviderError(err, "openai")).toBe(err);
  });

  it("wraps anything else as ProviderUnavailable", () => {
    const err = asProviderError(new Error("boom"), "openai");
    expect(err).toBeInstanceOf(ProviderUnavailable);
    expect(err.message).toBe("boom");
    expect(err.provider).toBe("openai");
  });
});

describe("toStructuredError", () => {
  it("keeps the status of a rejection", () => {
    expect(toStructuredError(new ProviderRejected("bad", "openai", 422))).toEqual({
      code: "PROVIDER_REJECTED",
      name: "ProviderRejected",
      message: "bad",
      status: 422,
    });
  });

  it("describes timeouts", () => {
    expect(toStructuredError(new ProviderTimeout(1_000, "stub"))).toEqual({
      code: "PROVIDER_TIMEOUT",
      name: "ProviderTimeout",
      message: "stub did not respond within 1000ms",
    });
  });

  it("handles plain errors and non-errors", () => {
    expect(toStructuredError(new TypeError("nope"))).toEqual({ code: "UNKNOWN", name: "TypeError", message: "nope" });
    expect(toStructuredError("str")).toEqual({ code: "UNKNOWN", name: "Error", message: "str" });
  });
});

it("non-fatal errors share the RelayError base", () => {
  const err = new RetrievalUnavailable("search down");
  expect(err).toBeInstanceOf(RelayError);
  expect(err.code).toBe("RETRIEVAL_UNAVAILABLE");
  expect(err.name).toBe("RetrievalUnavailable");
});
