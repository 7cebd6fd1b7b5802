import { setTimeout as sleep } from "node:timers/promises";
import { TransientFetchError, describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ActivitySource } from "../tracking/types.js";

const log = createLogger("github:retry");

export interface RetryPolicy {
  /** Total tries, the first one included. */
  maxAttempts: number;
  /** Delay before retry number `retry` (1-based). */
  delayMs(retry: number): number;
  isRetryable(err: unknown): boolean;
}

const BACKOFF_FACTOR_SECONDS = 1.25;
const MAX_BACKOFF_SECONDS = 120;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  delayMs: (retry) => Math.min(BACKOFF_FACTOR_SECONDS * 2 ** retry, MAX_BACKOFF_SECONDS) * 1000,
  isRetryable: (err) => err instanceof TransientFetchError,
};

export type Sleeper = (ms: number) => Promise<unknown>;

export async function withRetry<T>(
  label: string,
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: Sleeper = sleep,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!policy.isRetryable(err) || attempt >= policy.maxAttempts) {
        throw err;
      }
      const delay = policy.delayMs(attempt);
      log.warn(
        { operation: label, attempt, delayMs: delay, error: describeError(err) },
        "GitHub request failed, retrying",
      );
      await wait(delay);
    }
  }
}

/** Wraps every call of `source` in `withRetry`. */
export function retryingSource(
  source: ActivitySource,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: Sleeper = sleep,
): ActivitySource {
  const retry = <T>(label: string, operation: () => Promise<T>) =>
    withRetry(label, operation, policy, wait);

  return {
    listAffiliatedRepositories: (affiliations) =>
      retry("listAffiliatedRepositories", () => source.listAffiliatedRepositories(affiliations)),
    listRepositoriesUnderOwner: (owner) =>
      retry(`listRepositoriesUnderOwner(${owner})`, () => source.listRepositoriesUnderOwner(owner)),
    getRepository: (owner, name) =>
      retry(`getRepository(${owner}/${name})`, () => source.getRepository(owner, name)),
    listEvents: (repo, type, after) =>
      retry(`listEvents(${repo.owner}/${repo.name}, ${type})`, () =>
        source.listEvents(repo, type, after),
      ),
  };
}
