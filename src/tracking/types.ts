export const ACTIVITY_TYPES = [
  "issue",
  "pullRequest",
  "discussion",
  "release",
  "tag",
  "star",
  "fork",
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export function isActivityType(value: string): value is ActivityType {
  return (ACTIVITY_TYPES as readonly string[]).includes(value);
}

export const AFFILIATIONS = ["OWNER", "ORGANIZATION_MEMBER", "COLLABORATOR"] as const;

export type Affiliation = (typeof AFFILIATIONS)[number];

/** Identity of a repository. `id` survives renames; `owner` and `name` do not. */
export interface RepoRef {
  id: string;
  owner: string;
  name: string;
}

export interface Repository extends RepoRef {
  url: string;
  description: string | null;
}

export interface Actor {
  login: string;
  url: string;
  name: string | null;
}

export function fullName(repo: Pick<RepoRef, "owner" | "name">): string {
  return `${repo.owner}/${repo.name}`;
}

interface BaseEvent {
  repo: Repository;
  timestamp: Date;
  /** Whether the authenticated user is the author or actor. */
  isMine: boolean;
}

export interface IssueoidEvent extends BaseEvent {
  type: "issue" | "pullRequest" | "discussion";
  number: number;
  title: string;
  author: Actor | null;
  url: string;
}

export interface ReleaseEvent extends BaseEvent {
  type: "release";
  id: string;
  name: string | null;
  tagName: string;
  author: Actor | null;
  description: string | null;
  prerelease: boolean;
  draft: boolean;
  url: string;
}

export interface TagEvent extends BaseEvent {
  type: "tag";
  name: string;
  user: Actor | null;
}

export interface StarEvent extends BaseEvent {
  type: "star";
  user: Actor;
}

export interface ForkEvent extends BaseEvent {
  type: "fork";
  fork: Repository;
}

export type ActivityEvent = IssueoidEvent | ReleaseEvent | TagEvent | StarEvent | ForkEvent;

export interface RepoTrackedNotice {
  type: "tracked";
  timestamp: Date;
  repo: Repository;
}

export interface RepoUntrackedNotice {
  type: "untracked";
  timestamp: Date;
  repo: RepoRef;
}

export interface RepoRenamedNotice {
  type: "renamed";
  timestamp: Date;
  repo: Repository;
  oldRepo: RepoRef;
}

export type LifecycleNotice = RepoTrackedNotice | RepoUntrackedNotice | RepoRenamedNotice;

export type ReportItem = ActivityEvent | LifecycleNotice;

/** Where repositories and their activity come from. */
export interface ActivitySource {
  listAffiliatedRepositories(affiliations: readonly Affiliation[]): Promise<Repository[]>;
  listRepositoriesUnderOwner(owner: string): Promise<Repository[]>;
  getRepository(owner: string, name: string): Promise<Repository>;
  /** Events of one type with a timestamp strictly after `after`, oldest first. */
  listEvents(repo: Repository, type: ActivityType, after: Date): Promise<ActivityEvent[]>;
}
