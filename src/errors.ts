/**
 * Error taxonomy for the relay.
 *
 * Provider-layer errors are fatal to an exchange and reach the caller. Everything else
 * (retrieval, request logging, memory optimization) is reported as a warning and swallowed
 * at the orchestrator boundary.
 */

export type RelayErrorCode =
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_REJECTED"
  | "PROVIDER_TIMEOUT"
  | "RETRIEVAL_UNAVAILABLE"
  | "LOG_WRITE_FAILED"
  | "OPTIMIZATION_FAILED"
  | "INVALID_PROMPT";

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export abstract class ProviderError extends RelayError {
  constructor(
    message: string,
    readonly provider: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Network or transport failure, or a vendor-side (5xx / rate limit) failure. */
export class ProviderUnavailable extends ProviderError {
  readonly code = "PROVIDER_UNAVAILABLE" as const;
}

/** The vendor refused the request as malformed (4xx). */
export class ProviderRejected extends ProviderError {
  readonly code = "PROVIDER_REJECTED" as const;

  constructor(message: string, provider: string, readonly status: number, options?: { cause?: unknown }) {
    super(message, provider, options);
  }
}

export class ProviderTimeout extends ProviderError {
  readonly code = "PROVIDER_TIMEOUT" as const;

  constructor(readonly timeoutMs: number, provider: string, options?: { cause?: unknown }) {
    super(`${provider} did not respond within ${timeoutMs}ms`, provider, options);
  }
}

export class RetrievalUnavailable extends RelayError {
  readonly code = "RETRIEVAL_UNAVAILABLE" as const;
}

export class LogWriteFailed extends RelayError {
  readonly code = "LOG_WRITE_FAILED" as const;
}

export class OptimizationFailed extends RelayError {
  readonly code = "OPTIMIZATION_FAILED" as const;
}

export class InvalidPrompt extends RelayError {
  readonly code = "INVALID_PROMPT" as const;
}

export interface StructuredError {
  code: RelayErrorCode | "UNKNOWN";
  name: string;
  message: string;
  status?: number;
}

/** Serializable form of an error, as stored in request log records. */
export function toStructuredError(err: unknown): StructuredError {
  if (err instanceof ProviderRejected) {
    return { code: err.code, name: err.name, message: err.message, status: err.status };
  }
  if (err instanceof RelayError) {
    return { code: err.code, name: err.name, message: err.message };
  }
  if (err instanceof Error) {
    return { code: "UNKNOWN", name: err.name, message: err.message };
  }
  return { code: "UNKNOWN", name: "Error", message: String(err) };
}

/** Normalize a failure of the main completion call into the provider taxonomy. */
export function asProviderError(err: unknown, provider: string): ProviderError {
  if (err instanceof ProviderError) return err;
  return new ProviderUnavailable(errorMessage(err), provider, { cause: err });
}

/**
 * Map an HTTP status from a vendor API to the provider taxonomy.
 * 408 and 429 are transient, so they count as unavailability rather than rejection.
 */
export function providerErrorFromStatus(
  status: number | undefined,
  message: string,
  provider: string,
  cause?: unknown
): ProviderError {
  if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return new ProviderRejected(message, provider, status, { cause });
  }
  return new ProviderUnavailable(message, provider, { cause });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
