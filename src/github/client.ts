import { Octokit } from "@octokit/rest";
import { throttling } from "@octokit/plugin-throttling";
import { createLogger } from "../logger.js";

const log = createLogger("github");

const ThrottledOctokit = Octokit.plugin(throttling);

export type GitHubClient = InstanceType<typeof ThrottledOctokit>;

export interface GitHubClientOptions {
  token: string;
  baseUrl: string;
  userAgent?: string;
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  const client = new ThrottledOctokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    userAgent: options.userAgent ?? "repo-herald",
    throttle: {
      onRateLimit: (retryAfter, requestOptions, _octokit, retryCount) => {
        log.warn(
          {
            method: requestOptions.method,
            url: requestOptions.url,
            retryAfter,
            retryCount,
          },
          "GitHub rate limit hit",
        );
        if (retryCount < 1) {
          log.info({ retryAfter }, "Retrying after rate limit");
          return true;
        }
        return false;
      },
      onSecondaryRateLimit: (retryAfter, requestOptions) => {
        log.warn(
          { method: requestOptions.method, url: requestOptions.url, retryAfter },
          "GitHub secondary rate limit hit",
        );
        return false;
      },
    },
  });

  // Opt in to the current node id format so stored ids stay stable.
  client.hook.before("request", (requestOptions) => {
    requestOptions.headers["x-github-next-global-id"] = "1";
  });

  return client;
}
