import { z } from "zod";
import { FatalFetchError, NotFoundError, TransientFetchError } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  fullName,
  type ActivityEvent,
  type ActivitySource,
  type ActivityType,
  type Actor,
  type Affiliation,
  type Repository,
} from "../tracking/types.js";
import type { GitHubClient } from "./client.js";
import {
  DISCUSSIONS_QUERY,
  FORKS_QUERY,
  ISSUES_QUERY,
  OWNER_REPOS_QUERY,
  PAGE_SIZE,
  PULL_REQUESTS_QUERY,
  RELEASES_QUERY,
  SINGLE_REPO_QUERY,
  STARGAZERS_QUERY,
  TAGS_QUERY,
  VIEWER_REPOS_QUERY,
} from "./queries.js";

const log = createLogger("github:activity");

type GraphqlParameters = NonNullable<Parameters<GitHubClient["graphql"]>[1]>;

const pageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullable(),
});

const actorSchema = z.object({
  login: z.string(),
  url: z.string(),
  name: z.string().nullish(),
  isViewer: z.boolean().nullish(),
});

type ActorNode = z.infer<typeof actorSchema>;

const repoSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string(),
  description: z.string().nullable(),
  owner: actorSchema,
});

type RepoNode = z.infer<typeof repoSchema>;

const issueoidSchema = z.object({
  createdAt: z.string(),
  number: z.number(),
  title: z.string(),
  url: z.string(),
  author: actorSchema.nullable(),
});

const releaseSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  tagName: z.string(),
  url: z.string(),
  description: z.string().nullable(),
  isDraft: z.boolean(),
  isPrerelease: z.boolean(),
  createdAt: z.string(),
  publishedAt: z.string().nullable(),
  author: actorSchema.nullable(),
});

const userRefSchema = z.object({ user: actorSchema.nullable() }).nullable();

const tagSchema = z.object({
  name: z.string(),
  target: z.object({
    __typename: z.string(),
    tagger: z.object({ date: z.string().nullable(), user: actorSchema.nullable() }).nullish(),
    committedDate: z.string().nullish(),
    author: userRefSchema.optional(),
  }),
});

const starSchema = z.object({
  starredAt: z.string(),
  node: actorSchema,
});

const forkSchema = repoSchema.extend({ createdAt: z.string() });

function connectionSchema<T extends z.ZodType>(node: T) {
  return z.object({ nodes: z.array(node), pageInfo: pageInfoSchema });
}

const graphqlErrorsSchema = z.array(z.object({ type: z.string().optional(), message: z.string() }));

function toActor(node: ActorNode): Actor {
  return { login: node.login, url: node.url, name: node.name ?? null };
}

function toRepository(node: RepoNode): Repository {
  return {
    id: node.id,
    owner: node.owner.login,
    name: node.name,
    url: node.url,
    description: node.description,
  };
}

function hasStatus(err: unknown): err is Error & { status: number } {
  return err instanceof Error && "status" in err && typeof err.status === "number";
}

/** Sorts a GitHub client failure into the error taxonomy the engine understands. */
export function classifyError(err: unknown): Error {
  if (err instanceof Error && err.name === "GraphqlResponseError" && "errors" in err) {
    const errors = graphqlErrorsSchema.safeParse(err.errors);
    const first = errors.success ? errors.data[0] : undefined;
    if (first?.type === "NOT_FOUND") {
      return new NotFoundError(first.message);
    }
    return new FatalFetchError(`GitHub GraphQL error: ${err.message}`, { cause: err });
  }
  if (hasStatus(err)) {
    const rateLimited =
      err.status === 429 || (err.status === 403 && /rate limit/i.test(err.message));
    if (err.status >= 500 || rateLimited) {
      return new TransientFetchError(`GitHub request failed (${err.status}): ${err.message}`, {
        cause: err,
      });
    }
    return new FatalFetchError(`GitHub request failed (${err.status}): ${err.message}`, {
      cause: err,
    });
  }
  if (err instanceof Error) {
    return err;
  }
  return new Error(String(err));
}

interface Page<N> {
  nodes: N[];
  pageInfo: z.infer<typeof pageInfoSchema>;
}

interface ConnectionSpec<N> {
  query: string;
  /** `null` when the repository node no longer resolves. */
  parse(data: unknown): Page<N> | null;
  toEvent(repo: Repository, node: N): ActivityEvent | null;
  /**
   * Whether listing order follows event timestamps, so the first event at or
   * before the cutoff ends the scan. Otherwise the scan ends at the first page
   * lying wholly at or before the cutoff.
   */
  ordered: boolean;
}

function parseResponse<S extends z.ZodType>(schema: S, data: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new FatalFetchError(`Unexpected GitHub response for ${what}: ${result.error.message}`);
  }
  return result.data;
}

const ISSUEOID_CONNECTION = connectionSchema(issueoidSchema);

type IssueoidConnection = z.infer<typeof ISSUEOID_CONNECTION>;

const ISSUES_RESPONSE = z.object({
  node: z.object({ issues: ISSUEOID_CONNECTION }).nullable(),
});
const PULL_REQUESTS_RESPONSE = z.object({
  node: z.object({ pullRequests: ISSUEOID_CONNECTION }).nullable(),
});
const DISCUSSIONS_RESPONSE = z.object({
  node: z.object({ discussions: ISSUEOID_CONNECTION }).nullable(),
});

function issueoidSpec(
  type: "issue" | "pullRequest" | "discussion",
  query: string,
  parse: (data: unknown) => IssueoidConnection | null,
): ConnectionSpec<z.infer<typeof issueoidSchema>> {
  return {
    query,
    ordered: true,
    parse,
    toEvent: (repo, node) => ({
      type,
      repo,
      timestamp: new Date(node.createdAt),
      isMine: node.author?.isViewer === true,
      number: node.number,
      title: node.title,
      author: node.author ? toActor(node.author) : null,
      url: node.url,
    }),
  };
}

const RELEASES_RESPONSE = z.object({
  node: z.object({ releases: connectionSchema(releaseSchema) }).nullable(),
});
const TAGS_RESPONSE = z.object({
  node: z.object({ refs: connectionSchema(tagSchema) }).nullable(),
});
const STARS_RESPONSE = z.object({
  node: z
    .object({ stargazers: z.object({ edges: z.array(starSchema), pageInfo: pageInfoSchema }) })
    .nullable(),
});
const FORKS_RESPONSE = z.object({
  node: z.object({ forks: connectionSchema(forkSchema) }).nullable(),
});

const ISSUE_SPEC = issueoidSpec(
  "issue",
  ISSUES_QUERY,
  (data) => parseResponse(ISSUES_RESPONSE, data, "issues").node?.issues ?? null,
);
const PULL_REQUEST_SPEC = issueoidSpec(
  "pullRequest",
  PULL_REQUESTS_QUERY,
  (data) => parseResponse(PULL_REQUESTS_RESPONSE, data, "pull requests").node?.pullRequests ?? null,
);
const DISCUSSION_SPEC = issueoidSpec(
  "discussion",
  DISCUSSIONS_QUERY,
  (data) => parseResponse(DISCUSSIONS_RESPONSE, data, "discussions").node?.discussions ?? null,
);

const RELEASE_SPEC: ConnectionSpec<z.infer<typeof releaseSchema>> = {
  query: RELEASES_QUERY,
  // listed by creation, reported by publication
  ordered: false,
  parse: (data) => parseResponse(RELEASES_RESPONSE, data, "releases").node?.releases ?? null,
  toEvent: (repo, node) => ({
    type: "release",
    repo,
    timestamp: new Date(node.publishedAt ?? node.createdAt),
    isMine: node.author?.isViewer === true,
    id: node.id,
    name: node.name,
    tagName: node.tagName,
    author: node.author ? toActor(node.author) : null,
    description: node.description,
    prerelease: node.isPrerelease,
    draft: node.isDraft,
    url: node.url,
  }),
};

const TAG_SPEC: ConnectionSpec<z.infer<typeof tagSchema>> = {
  query: TAGS_QUERY,
  // listed by commit date, reported by tagger date for annotated tags
  ordered: false,
  parse: (data) => parseResponse(TAGS_RESPONSE, data, "tags").node?.refs ?? null,
  toEvent: (repo, node) => {
    const { target } = node;
    let date: string | null | undefined;
    let user: ActorNode | null | undefined;
    if (target.__typename === "Commit") {
      date = target.committedDate;
      user = target.author?.user;
    } else if (target.__typename === "Tag") {
      date = target.tagger?.date;
      user = target.tagger?.user;
    } else {
      log.debug(
        { tag: node.name, target: target.__typename },
        "Tag points at neither a commit nor a tag, discarding",
      );
      return null;
    }
    if (date === null || date === undefined) {
      log.debug({ tag: node.name }, "Tag has no date, discarding");
      return null;
    }
    return {
      type: "tag",
      repo,
      timestamp: new Date(date),
      isMine: user?.isViewer === true,
      name: node.name,
      user: user ? toActor(user) : null,
    };
  },
};

const STAR_SPEC: ConnectionSpec<z.infer<typeof starSchema>> = {
  query: STARGAZERS_QUERY,
  ordered: true,
  parse: (data) => {
    const stars = parseResponse(STARS_RESPONSE, data, "stargazers").node?.stargazers;
    return stars ? { nodes: stars.edges, pageInfo: stars.pageInfo } : null;
  },
  toEvent: (repo, edge) => ({
    type: "star",
    repo,
    timestamp: new Date(edge.starredAt),
    isMine: edge.node.isViewer === true,
    user: toActor(edge.node),
  }),
};

const FORK_SPEC: ConnectionSpec<z.infer<typeof forkSchema>> = {
  query: FORKS_QUERY,
  ordered: true,
  parse: (data) => parseResponse(FORKS_RESPONSE, data, "forks").node?.forks ?? null,
  toEvent: (repo, node) => ({
    type: "fork",
    repo,
    timestamp: new Date(node.createdAt),
    isMine: node.owner.isViewer === true,
    fork: toRepository(node),
  }),
};

const VIEWER_REPOS_RESPONSE = z.object({
  viewer: z.object({ repositories: connectionSchema(repoSchema) }),
});
const OWNER_REPOS_RESPONSE = z.object({
  repositoryOwner: z.object({ repositories: connectionSchema(repoSchema) }).nullable(),
});
const SINGLE_REPO_RESPONSE = z.object({ repository: repoSchema.nullable() });

/** ActivitySource backed by the GitHub GraphQL API. */
export class GitHubActivitySource implements ActivitySource {
  constructor(private readonly client: Pick<GitHubClient, "graphql">) {}

  private async query(query: string, parameters: GraphqlParameters): Promise<unknown> {
    try {
      return await this.client.graphql<unknown>(query, parameters);
    } catch (err) {
      throw classifyError(err);
    }
  }

  private async pageRepos(
    query: string,
    parameters: GraphqlParameters,
    extract: (data: unknown) => Page<RepoNode>,
  ): Promise<Repository[]> {
    const repos: Repository[] = [];
    let cursor: string | null = null;
    for (;;) {
      const page = extract(await this.query(query, { ...parameters, pageSize: PAGE_SIZE, cursor }));
      repos.push(...page.nodes.map(toRepository));
      if (!page.pageInfo.hasNextPage || page.pageInfo.endCursor === null) {
        return repos;
      }
      cursor = page.pageInfo.endCursor;
    }
  }

  async listAffiliatedRepositories(affiliations: readonly Affiliation[]): Promise<Repository[]> {
    return this.pageRepos(
      VIEWER_REPOS_QUERY,
      { affiliations: [...affiliations] },
      (data) =>
        parseResponse(VIEWER_REPOS_RESPONSE, data, "viewer repositories").viewer.repositories,
    );
  }

  async listRepositoriesUnderOwner(owner: string): Promise<Repository[]> {
    return this.pageRepos(OWNER_REPOS_QUERY, { owner }, (data) => {
      const response = parseResponse(OWNER_REPOS_RESPONSE, data, `repositories of ${owner}`);
      // GitHub answers a missing owner with null rather than a NOT_FOUND error
      if (response.repositoryOwner === null) {
        throw new NotFoundError(`No such repository owner: ${owner}`);
      }
      return response.repositoryOwner.repositories;
    });
  }

  async getRepository(owner: string, name: string): Promise<Repository> {
    const data = await this.query(SINGLE_REPO_QUERY, { owner, name });
    const { repository } = parseResponse(SINGLE_REPO_RESPONSE, data, `${owner}/${name}`);
    if (repository === null) {
      throw new NotFoundError(`No such repository: ${owner}/${name}`);
    }
    return toRepository(repository);
  }

  async listEvents(repo: Repository, type: ActivityType, after: Date): Promise<ActivityEvent[]> {
    switch (type) {
      case "issue":
        return this.collect(ISSUE_SPEC, repo, after);
      case "pullRequest":
        return this.collect(PULL_REQUEST_SPEC, repo, after);
      case "discussion":
        return this.collect(DISCUSSION_SPEC, repo, after);
      case "release":
        return this.collect(RELEASE_SPEC, repo, after);
      case "tag":
        return this.collect(TAG_SPEC, repo, after);
      case "star":
        return this.collect(STAR_SPEC, repo, after);
      case "fork":
        return this.collect(FORK_SPEC, repo, after);
    }
  }

  private async collect<N>(
    spec: ConnectionSpec<N>,
    repo: Repository,
    after: Date,
  ): Promise<ActivityEvent[]> {
    const events: ActivityEvent[] = [];
    let cursor: string | null = null;
    for (;;) {
      const page = spec.parse(
        await this.query(spec.query, { id: repo.id, pageSize: PAGE_SIZE, cursor }),
      );
      if (page === null) {
        log.warn({ repo: fullName(repo) }, "Repository no longer resolves, no activity fetched");
        break;
      }

      let reachedCutoff = false;
      let anyNew = false;
      for (const node of page.nodes) {
        const event = spec.toEvent(repo, node);
        if (event === null) continue;
        if (event.timestamp.getTime() > after.getTime()) {
          log.debug(
            { repo: fullName(repo), type: event.type, at: event.timestamp.toISOString() },
            "Found activity",
          );
          events.push(event);
          anyNew = true;
        } else {
          reachedCutoff = true;
        }
      }

      const done = spec.ordered ? reachedCutoff : !anyNew;
      if (done || !page.pageInfo.hasNextPage || page.pageInfo.endCursor === null) {
        break;
      }
      cursor = page.pageInfo.endCursor;
    }
    return events.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}
