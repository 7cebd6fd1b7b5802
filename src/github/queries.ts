const ACTOR_FIELDS = /* GraphQL */ `login url ... on User { name isViewer }`;

const USER_FIELDS = /* GraphQL */ `login url name isViewer`;

const REPO_FIELDS = /* GraphQL */ `
  id
  name
  url
  description
  owner { login url ... on User { isViewer } }
`;

const PAGE_INFO = /* GraphQL */ `pageInfo { hasNextPage endCursor }`;

export const PAGE_SIZE = 50;

export const VIEWER_REPOS_QUERY = /* GraphQL */ `
  query ViewerRepos($affiliations: [RepositoryAffiliation!], $pageSize: Int!, $cursor: String) {
    viewer {
      repositories(
        ownerAffiliations: $affiliations
        orderBy: { field: NAME, direction: ASC }
        first: $pageSize
        after: $cursor
      ) {
        nodes { ${REPO_FIELDS} }
        ${PAGE_INFO}
      }
    }
  }
`;

export const OWNER_REPOS_QUERY = /* GraphQL */ `
  query OwnerRepos($owner: String!, $pageSize: Int!, $cursor: String) {
    repositoryOwner(login: $owner) {
      repositories(orderBy: { field: NAME, direction: ASC }, first: $pageSize, after: $cursor) {
        nodes { ${REPO_FIELDS} }
        ${PAGE_INFO}
      }
    }
  }
`;

export const SINGLE_REPO_QUERY = /* GraphQL */ `
  query SingleRepo($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) { ${REPO_FIELDS} }
  }
`;

function repoConnectionQuery(operation: string, connection: string): string {
  return /* GraphQL */ `
  query ${operation}($id: ID!, $pageSize: Int!, $cursor: String) {
    node(id: $id) {
      ... on Repository {
        ${connection}
      }
    }
  }
`;
}

function issueoidQuery(operation: string, field: string): string {
  return repoConnectionQuery(
    operation,
    `${field}(orderBy: { field: CREATED_AT, direction: DESC }, first: $pageSize, after: $cursor) {
          nodes { createdAt number title url author { ${ACTOR_FIELDS} } }
          ${PAGE_INFO}
        }`,
  );
}

export const ISSUES_QUERY = issueoidQuery("RepoIssues", "issues");

export const PULL_REQUESTS_QUERY = issueoidQuery("RepoPullRequests", "pullRequests");

export const DISCUSSIONS_QUERY = issueoidQuery("RepoDiscussions", "discussions");

export const RELEASES_QUERY = repoConnectionQuery(
  "RepoReleases",
  `releases(orderBy: { field: CREATED_AT, direction: DESC }, first: $pageSize, after: $cursor) {
          nodes {
            id name tagName url description isDraft isPrerelease createdAt publishedAt
            author { ${USER_FIELDS} }
          }
          ${PAGE_INFO}
        }`,
);

export const TAGS_QUERY = repoConnectionQuery(
  "RepoTags",
  `refs(
          refPrefix: "refs/tags/"
          orderBy: { field: TAG_COMMIT_DATE, direction: DESC }
          first: $pageSize
          after: $cursor
        ) {
          nodes {
            name
            target {
              __typename
              ... on Tag { tagger { date user { ${USER_FIELDS} } } }
              ... on Commit { committedDate author { user { ${USER_FIELDS} } } }
            }
          }
          ${PAGE_INFO}
        }`,
);

export const STARGAZERS_QUERY = repoConnectionQuery(
  "RepoStargazers",
  `stargazers(orderBy: { field: STARRED_AT, direction: DESC }, first: $pageSize, after: $cursor) {
          edges { starredAt node { ${USER_FIELDS} } }
          ${PAGE_INFO}
        }`,
);

export const FORKS_QUERY = repoConnectionQuery(
  "RepoForks",
  `forks(orderBy: { field: CREATED_AT, direction: DESC }, first: $pageSize, after: $cursor) {
          nodes { createdAt ${REPO_FIELDS} }
          ${PAGE_INFO}
        }`,
);
