/**
 * Retry Logic Unit Tests
 */

import { describe, it, expect, vi } from "vitest";
import type { RetryContext } from "@kennelcast/types";
import { NetworkError } from "./errors";
import {
  RetryHandler,
  exponentialBackoffPolicy,
  fixedDelayPolicy,
  isRetryableError,
  sleep,
  withRetry,
} from "./retry";

const noSleep = () => vi.fn(async (_ms: number) => {});

describe("withRetry", () => {
  it("invokes a failing operation maxAttempts times and rethrows the last error", async () => {
    const wait = noSleep();
    const errors: Error[] = [];
    const operation = vi.fn(async (context: RetryContext) => {
      const error = new Error(`failure ${context.attempt}`);
      errors.push(error);
      throw error;
    });

    const failure = await withRetry(
      operation,
      fixedDelayPolicy({ maxAttempts: 3, delayMs: 250 }),
      { sleep: wait },
    ).catch((error: unknown) => error);

    expect(operation).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([250, 250]);
    expect(failure).toBe(errors[2]);
  });

  it("returns as soon as an attempt succeeds", async () => {
    const wait = noSleep();
    const operation = vi
      .fn<(context: RetryContext) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("content");

    const result = await withRetry(operation, fixedDelayPolicy({ maxAttempts: 3 }), {
      sleep: wait,
    });

    expect(result).toBe("content");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledTimes(1);
  });

  it("passes a 1-based retry context to each attempt", async () => {
    const contexts: RetryContext[] = [];
    await withRetry(
      async (context) => {
        contexts.push(context);
        if (context.attempt < 3) throw new Error("again");
        return "ok";
      },
      fixedDelayPolicy({ maxAttempts: 3, delayMs: 10 }),
      { sleep: noSleep() },
    );

    expect(contexts).toEqual([
      { attempt: 1, maxAttempts: 3, delay: 10 },
      { attempt: 2, maxAttempts: 3, delay: 10 },
      { attempt: 3, maxAttempts: 3, delay: 10 },
    ]);
  });

  it("reports each retry before sleeping", async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(async () => {
      throw new Error("down");
    });

    await withRetry(operation, fixedDelayPolicy({ maxAttempts: 3 }), {
      sleep: noSleep(),
      onRetry,
    }).catch(() => undefined);

    expect(onRetry.mock.calls.map(([context]) => context.attempt)).toEqual([1, 2]);
  });

  it.each([
    ["NO_CONNECTION", NetworkError.noConnection()],
    ["DECODING_FAILED", NetworkError.decodingFailed(new SyntaxError("bad json"))],
    ["INVALID_ENDPOINT", NetworkError.invalidEndpoint("nope", "/api/v1/content")],
    ["INVALID_REQUEST", NetworkError.invalidRequest("analytics events")],
  ])("does not retry %s", async (_code, error) => {
    const wait = noSleep();
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(withRetry(operation, fixedDelayPolicy(), { sleep: wait })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it("retries client and server HTTP errors alike", async () => {
    const operation = vi.fn(async () => {
      throw NetworkError.httpError(404);
    });

    await expect(
      withRetry(operation, fixedDelayPolicy({ maxAttempts: 3 }), { sleep: noSleep() }),
    ).rejects.toMatchObject({ code: "HTTP_ERROR", statusCode: 404 });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("always makes at least one attempt", async () => {
    const operation = vi.fn(async () => "once");

    await expect(withRetry(operation, fixedDelayPolicy({ maxAttempts: 0 }))).resolves.toBe(
      "once",
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY])(
    "falls back to the default bound for maxAttempts %s",
    async (maxAttempts) => {
      const wait = noSleep();
      const operation = vi.fn(async () => {
        throw new Error("down");
      });

      await expect(
        withRetry(operation, fixedDelayPolicy({ maxAttempts, delayMs: 0 }), { sleep: wait }),
      ).rejects.toThrow("down");
      expect(operation).toHaveBeenCalledTimes(3);
    },
  );

  describe("cancellation", () => {
    it("makes no attempt when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn(async () => "never");

      await expect(
        withRetry(operation, fixedDelayPolicy(), { signal: controller.signal }),
      ).rejects.toMatchObject({ code: "CANCELLED" });
      expect(operation).not.toHaveBeenCalled();
    });

    it("interrupts the delay between attempts", async () => {
      const controller = new AbortController();
      const operation = vi.fn(async () => {
        throw new Error("down");
      });

      const pending = withRetry(operation, fixedDelayPolicy({ delayMs: 60000 }), {
        signal: controller.signal,
      });
      await vi.waitFor(() => expect(operation).toHaveBeenCalledTimes(1));
      controller.abort();

      await expect(pending).rejects.toMatchObject({ code: "CANCELLED" });
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
    vi.useRealTimers();
  });

  it("rejects with CANCELLED for an aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toMatchObject({ code: "CANCELLED" });
  });
});

describe("policies", () => {
  it("uses the same delay for every attempt by default", () => {
    const policy = fixedDelayPolicy();

    expect(policy.maxAttempts).toBe(3);
    expect([1, 2, 3].map((attempt) => policy.delayFor(attempt))).toEqual([2000, 2000, 2000]);
  });

  it("doubles the backoff delay up to the cap", () => {
    const policy = exponentialBackoffPolicy({ baseDelayMs: 100, maxDelayMs: 1000 });

    expect([1, 2, 3, 4, 5].map((attempt) => policy.delayFor(attempt))).toEqual([
      100, 200, 400, 800, 1000,
    ]);
  });

  it("adds proportional jitter to the backoff delay", () => {
    const policy = exponentialBackoffPolicy({
      baseDelayMs: 100,
      jitterRatio: 0.5,
      random: () => 1,
    });

    expect(policy.delayFor(1)).toBe(150);
  });

  it("treats unknown errors as retryable", () => {
    expect(isRetryableError(new Error("anything"))).toBe(true);
    expect(isRetryableError(NetworkError.requestFailed(new Error("reset")))).toBe(true);
    expect(isRetryableError(NetworkError.cancelled())).toBe(false);
  });
});

describe("RetryHandler", () => {
  it("uses its default policy", async () => {
    const wait = noSleep();
    const handler = new RetryHandler(fixedDelayPolicy({ maxAttempts: 2, delayMs: 5 }));
    const operation = vi.fn(async () => {
      throw new Error("down");
    });

    await handler.retry(operation, undefined, undefined, { sleep: wait }).catch(() => undefined);

    expect(operation).toHaveBeenCalledTimes(2);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([5]);
  });

  it("overrides the bound and delay per call", async () => {
    const wait = noSleep();
    const handler = new RetryHandler();
    const operation = vi.fn(async () => {
      throw new Error("down");
    });

    await handler.retry(operation, 4, 0, { sleep: wait }).catch(() => undefined);

    expect(operation).toHaveBeenCalledTimes(4);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([0, 0, 0]);
  });

  it("stops after the default bound when called with a NaN bound", async () => {
    const handler = new RetryHandler();
    const operation = vi.fn(async () => {
      throw new Error("down");
    });

    await expect(
      handler.retry(operation, Number.NaN, 0, { sleep: noSleep() }),
    ).rejects.toThrow("down");
    expect(operation).toHaveBeenCalledTimes(3);
  });
});
