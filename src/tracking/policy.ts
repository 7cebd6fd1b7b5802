import type { RepoPattern } from "./repo-pattern.js";
import { ACTIVITY_TYPES, fullName, type ActivityType, type Repository } from "./types.js";

export const TYPE_POLICY_KEYS = {
  issue: "issues",
  pullRequest: "pullRequests",
  discussion: "discussions",
  release: "releases",
  tag: "tags",
  star: "stars",
  fork: "forks",
} as const satisfies Record<ActivityType, string>;

export type TypePolicyKey = (typeof TYPE_POLICY_KEYS)[ActivityType];

export type ModifierKey = "prereleases" | "drafts" | "releasedTags" | "myActivity";

export type PolicyKey = TypePolicyKey | ModifierKey;

export type ActivityPolicy = Record<PolicyKey, boolean>;

/** One precedence layer: keys it leaves unset fall through to the next layer. */
export type PartialPolicy = Partial<ActivityPolicy>;

export const POLICY_KEYS: readonly PolicyKey[] = [
  "issues",
  "pullRequests",
  "discussions",
  "releases",
  "prereleases",
  "drafts",
  "tags",
  "releasedTags",
  "stars",
  "forks",
  "myActivity",
];

export const DEFAULT_POLICY: ActivityPolicy = {
  issues: true,
  pullRequests: true,
  discussions: true,
  releases: true,
  prereleases: true,
  drafts: true,
  tags: true,
  releasedTags: false,
  stars: true,
  forks: true,
  myActivity: false,
};

export interface RepoPolicyEntry {
  pattern: RepoPattern;
  prefs: PartialPolicy;
  /** `false` keeps the entry from implicitly adding its repositories to the tracked set. */
  include: boolean;
}

export interface PolicyConfig {
  global: PartialPolicy;
  affiliated: PartialPolicy;
  repos: RepoPolicyEntry[];
}

function findEntry(
  config: PolicyConfig,
  predicate: (pattern: RepoPattern) => boolean,
): PartialPolicy {
  return config.repos.find((entry) => predicate(entry.pattern))?.prefs ?? {};
}

/**
 * Resolves each key independently through the exact-repo, owner-wildcard,
 * affiliated and global layers, taking the first layer that sets it.
 */
export function policyFor(
  repo: Repository,
  isAffiliated: boolean,
  config: PolicyConfig,
): ActivityPolicy {
  const layers: PartialPolicy[] = [
    findEntry(config, (p) => !p.isWildcard && p.matches(repo)),
    findEntry(config, (p) => p.isWildcard && p.matches(repo)),
  ];
  if (isAffiliated) {
    layers.push(config.affiliated);
  }
  layers.push(config.global);

  const policy = { ...DEFAULT_POLICY };
  for (const key of POLICY_KEYS) {
    for (const layer of layers) {
      const value = layer[key];
      if (value !== undefined) {
        policy[key] = value;
        break;
      }
    }
  }
  return policy;
}

export function enabledTypes(policy: ActivityPolicy): ActivityType[] {
  return ACTIVITY_TYPES.filter((type) => policy[TYPE_POLICY_KEYS[type]]);
}

export interface TrackedRepo {
  repo: Repository;
  isAffiliated: boolean;
  policy: ActivityPolicy;
}

export function dumpPolicies(tracked: readonly TrackedRepo[]): Record<string, ActivityPolicy> {
  const sorted = [...tracked].sort((a, b) =>
    fullName(a.repo).localeCompare(fullName(b.repo)),
  );
  const dump: Record<string, ActivityPolicy> = {};
  for (const { repo, policy } of sorted) {
    dump[fullName(repo)] = policy;
  }
  return dump;
}
