/**
 * Caller-supplied deadline for provider calls.
 * Races a promise (or each step of a stream) against a timer and aborts the request on expiry.
 */

import { ProviderTimeout, errorMessage } from "../../errors";
import { logger } from "../../logging";

export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly error: ProviderTimeout;

  constructor(readonly timeoutMs: number, provider: string) {
    this.error = new ProviderTimeout(timeoutMs, provider);
    this.timer = setTimeout(() => this.controller.abort(this.error), timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  /** Resolve with p, or reject with ProviderTimeout if the deadline passes first. */
  race<T>(p: Promise<T>): Promise<T> {
    if (this.expired) return Promise.reject(this.error);
    const signal = this.controller.signal;
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(this.error);
      signal.addEventListener("abort", onAbort, { once: true });
      p.then(
        (v) => {
          signal.removeEventListener("abort", onAbort);
          resolve(v);
        },
        (e: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(this.expired ? this.error : e);
        }
      );
    });
  }

  /** Iterate a stream, failing with ProviderTimeout if any step outlives the deadline. */
  async *iterate<T>(source: AsyncIterable<T>): AsyncGenerator<T, void, undefined> {
    const it = source[Symbol.asyncIterator]();
    let finished = false;
    try {
      while (true) {
        const step = await this.race(it.next());
        if (step.done) {
          finished = true;
          return;
        }
        yield step.value;
      }
    } finally {
      if (!finished && it.return) {
        // The source may be stuck on a pending read; do not wait for it to unwind.
        it.return().catch((err: unknown) =>
          logger.debug({ event: "STREAM_CLOSE_FAILED", err: errorMessage(err) }, "Abandoned stream did not close cleanly")
        );
      }
    }
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}
