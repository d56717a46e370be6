import { describe, it, expect } from "vitest";
import { ServiceError } from "../errors";
import { backoffDelay, withRetry } from "./retry";

const policy = { retries: 3, baseDelayMs: 100, factor: 2, maxDelayMs: 1000 };

const recorder = () => {
  const waits: number[] = [];
  return { waits, sleep: async (ms: number) => void waits.push(ms) };
};

describe("backoffDelay", () => {
  it("grows by the factor and stops at the cap", () => {
    const p = { retries: 5, baseDelayMs: 500, factor: 2, maxDelayMs: 4000 };
    expect([0, 1, 2, 3, 4].map((a) => backoffDelay(p, a))).toEqual([500, 1000, 2000, 4000, 4000]);
  });

  it("keeps a fixed delay with factor 1", () => {
    const p = { retries: 2, baseDelayMs: 250, factor: 1, maxDelayMs: 10_000 };
    expect([0, 1, 2].map((a) => backoffDelay(p, a))).toEqual([250, 250, 250]);
  });
});

describe("withRetry", () => {
  it("retries retryable errors and returns the eventual result", async () => {
    const { waits, sleep } = recorder();
    const attempts: number[] = [];

    const result = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new ServiceError("RateLimited", "slow down");
        return "ok";
      },
      { ...policy, label: "test", sleep },
    );

    expect(result).toBe("ok");
    expect(attempts).toEqual([0, 1, 2]);
    expect(waits).toEqual([100, 200]);
  });

  it("does not retry errors that are not retryable", async () => {
    const { waits, sleep } = recorder();
    let calls = 0;
    const err = new ServiceError("AuthError", "bad key");

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw err;
        },
        { ...policy, label: "test", sleep },
      ),
    ).rejects.toBe(err);

    expect(calls).toBe(1);
    expect(waits).toEqual([]);
  });

  it("rethrows the last error once the budget is spent", async () => {
    const { waits, sleep } = recorder();
    const seen: ServiceError[] = [];

    const run = withRetry(
      async (attempt) => {
        const e = new ServiceError("ConnectionFailed", `refused #${attempt}`);
        seen.push(e);
        throw e;
      },
      { retries: 2, baseDelayMs: 50, factor: 1, maxDelayMs: 50, label: "test", sleep },
    );

    await expect(run).rejects.toThrow("refused #2");
    expect(seen).toHaveLength(3);
    expect(waits).toEqual([50, 50]);
  });

  it("uses a custom predicate when given", async () => {
    const { sleep } = recorder();
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls === 1) throw new Error("flaky");
        return calls;
      },
      { ...policy, label: "test", sleep, shouldRetry: (e) => e instanceof Error && e.message === "flaky" },
    );

    expect(result).toBe(2);
  });
});
