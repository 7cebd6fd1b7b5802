import { describe, expect, it, vi } from "vitest";
import { FatalFetchError, TransientFetchError } from "../errors.js";
import type { ActivitySource, Repository } from "../tracking/types.js";
import { DEFAULT_RETRY_POLICY, retryingSource, withRetry } from "./retry.js";

const noWait = vi.fn(async (_ms: number) => undefined);

describe("DEFAULT_RETRY_POLICY", () => {
  it("backs off exponentially up to two minutes", () => {
    expect([1, 2, 3, 4, 5, 6, 7].map((n) => DEFAULT_RETRY_POLICY.delayMs(n))).toEqual([
      2500, 5000, 10000, 20000, 40000, 80000, 120000,
    ]);
  });

  it("retries transient failures only", () => {
    expect(DEFAULT_RETRY_POLICY.isRetryable(new TransientFetchError("502"))).toBe(true);
    expect(DEFAULT_RETRY_POLICY.isRetryable(new FatalFetchError("401"))).toBe(false);
    expect(DEFAULT_RETRY_POLICY.isRetryable(new Error("boom"))).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns once the operation succeeds", async () => {
    const wait = vi.fn(async (_ms: number) => undefined);
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientFetchError("502"))
      .mockRejectedValueOnce(new TransientFetchError("503"))
      .mockResolvedValue("ok");

    await expect(withRetry("op", operation, DEFAULT_RETRY_POLICY, wait)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[2500], [5000]]);
  });

  it("gives up after the last attempt with the last error", async () => {
    const operation = vi.fn(async () => {
      throw new TransientFetchError("still down");
    });
    await expect(
      withRetry("op", operation, { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 }, noWait),
    ).rejects.toThrow("still down");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("does not retry fatal errors", async () => {
    const wait = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(async () => {
      throw new FatalFetchError("Bad credentials");
    });
    await expect(withRetry("op", operation, DEFAULT_RETRY_POLICY, wait)).rejects.toThrow(FatalFetchError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });
});

describe("retryingSource", () => {
  it("retries each call of the wrapped source", async () => {
    const repo: Repository = { id: "R_1", owner: "acme", name: "widget", url: "https://github.com/acme/widget", description: null };
    const source: ActivitySource = {
      listAffiliatedRepositories: vi.fn(async () => []),
      listRepositoriesUnderOwner: vi.fn(async () => []),
      getRepository: vi
        .fn<ActivitySource["getRepository"]>()
        .mockRejectedValueOnce(new TransientFetchError("timeout"))
        .mockResolvedValue(repo),
      listEvents: vi.fn(async () => []),
    };

    const wrapped = retryingSource(source, DEFAULT_RETRY_POLICY, noWait);
    await expect(wrapped.getRepository("acme", "widget")).resolves.toBe(repo);
    expect(source.getRepository).toHaveBeenCalledTimes(2);
  });
});
