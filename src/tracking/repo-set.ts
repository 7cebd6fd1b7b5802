import { NotFoundError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { RepoPattern } from "./repo-pattern.js";
import { fullName, type ActivitySource, type Affiliation, type Repository } from "./types.js";

const log = createLogger("tracking:repo-set");

export interface RepoSelection {
  affiliations: readonly Affiliation[];
  include: readonly RepoPattern[];
  exclude: readonly RepoPattern[];
  /** Keys of the per-repo policy table that do not opt out of inclusion. */
  implicitInclude: readonly RepoPattern[];
}

export interface ResolvedRepo {
  repo: Repository;
  isAffiliated: boolean;
}

type RepoDirectory = Pick<
  ActivitySource,
  "listAffiliatedRepositories" | "listRepositoriesUnderOwner" | "getRepository"
>;

function dedupeByKey(patterns: readonly RepoPattern[]): RepoPattern[] {
  const seen = new Map<string, RepoPattern>();
  for (const pattern of patterns) {
    if (!seen.has(pattern.key())) {
      seen.set(pattern.key(), pattern);
    }
  }
  return [...seen.values()];
}

async function tolerateMissing<T>(what: string, fetch: () => Promise<T>): Promise<T | null> {
  try {
    return await fetch();
  } catch (err) {
    if (err instanceof NotFoundError) {
      log.warn({ target: what }, "Not found on GitHub, skipping");
      return null;
    }
    throw err;
  }
}

/**
 * Affiliated repositories, plus everything matched by an include pattern or a
 * policy-table key, minus everything matched by an exclude pattern.
 */
export async function resolveRepoSet(
  directory: RepoDirectory,
  selection: RepoSelection,
): Promise<ResolvedRepo[]> {
  const isExcluded = (repo: Pick<Repository, "owner" | "name">) =>
    selection.exclude.some((p) => p.matches(repo));
  const resolved = new Map<string, ResolvedRepo>();

  const add = (repo: Repository, isAffiliated: boolean) => {
    if (isExcluded(repo)) {
      log.info({ repo: fullName(repo) }, "Repo is excluded by config, skipping");
    } else if (resolved.has(repo.id)) {
      log.debug({ repo: fullName(repo) }, "Repo reached more than once");
    } else {
      resolved.set(repo.id, { repo, isAffiliated });
    }
  };

  if (selection.affiliations.length === 0) {
    log.info("No affiliations set, not fetching affiliated repositories");
  } else {
    const affiliated = await directory.listAffiliatedRepositories(selection.affiliations);
    log.info(
      { count: affiliated.length, affiliations: selection.affiliations },
      "Fetched affiliated repositories",
    );
    for (const repo of affiliated) {
      add(repo, true);
    }
  }

  const included = dedupeByKey([...selection.include, ...selection.implicitInclude]);
  const wildcardOwners = included.filter((p) => p.isWildcard).map((p) => p.owner);
  const singles: Array<{ owner: string; name: string }> = [];
  for (const { owner, name } of included) {
    const coveredByWildcard = wildcardOwners.some((w) => w.toLowerCase() === owner.toLowerCase());
    if (name !== null && !coveredByWildcard) {
      singles.push({ owner, name });
    }
  }

  for (const owner of wildcardOwners) {
    if (selection.exclude.some((p) => p.isWildcard && p.matches({ owner, name: "*" }))) {
      log.info({ owner }, "Owner is excluded by config, skipping");
      continue;
    }
    const repos = await tolerateMissing(`owner ${owner}`, () =>
      directory.listRepositoriesUnderOwner(owner),
    );
    for (const repo of repos ?? []) {
      add(repo, false);
    }
  }

  for (const { owner, name } of singles) {
    if (isExcluded({ owner, name })) {
      log.info({ repo: `${owner}/${name}` }, "Repo is excluded by config, skipping");
      continue;
    }
    const repo = await tolerateMissing(`repository ${owner}/${name}`, () =>
      directory.getRepository(owner, name),
    );
    if (repo !== null) {
      add(repo, false);
    }
  }

  return [...resolved.values()];
}
