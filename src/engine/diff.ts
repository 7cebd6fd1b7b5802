import { TransientFetchError, describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { RepoTrackingRecord, TrackingState } from "../state/schema.js";
import { enabledTypes, type ActivityPolicy, type TrackedRepo } from "../tracking/policy.js";
import {
  fullName,
  type ActivityEvent,
  type ActivitySource,
  type ActivityType,
  type LifecycleNotice,
  type ReleaseEvent,
} from "../tracking/types.js";
import { mapWithConcurrency } from "../util/pool.js";

const log = createLogger("engine:diff");

export const DEFAULT_CONCURRENCY = 4;

export interface DiffInput {
  tracked: readonly TrackedRepo[];
  previous: TrackingState;
  source: Pick<ActivitySource, "listEvents">;
  /** Start of the run: fresh cutoffs and lifecycle notices use it. */
  now: Date;
  concurrency?: number;
}

export interface DiffResult {
  /** Per repository in input order, then per activity type, oldest first. */
  events: ActivityEvent[];
  notices: LifecycleNotice[];
  nextState: TrackingState;
}

interface RepoPlan {
  tracked: TrackedRepo;
  types: ActivityType[];
  previous: RepoTrackingRecord;
}

interface FetchUnit {
  planIndex: number;
  type: ActivityType;
  after: Date;
}

type FetchOutcome = { ok: true; events: ActivityEvent[] } | { ok: false };

async function fetchUnit(
  source: DiffInput["source"],
  plan: RepoPlan,
  unit: FetchUnit,
): Promise<FetchOutcome> {
  const repo = plan.tracked.repo;
  try {
    const events = await source.listEvents(repo, unit.type, unit.after);
    log.debug({ repo: fullName(repo), type: unit.type, count: events.length }, "Fetched activity");
    return { ok: true, events };
  } catch (err) {
    if (err instanceof TransientFetchError) {
      log.warn(
        { repo: fullName(repo), type: unit.type, error: describeError(err) },
        "Fetch failed after retries, leaving cutoff in place for the next run",
      );
      return { ok: false };
    }
    throw err;
  }
}

function latest(cutoff: Date, events: readonly ActivityEvent[]): Date {
  let max = cutoff;
  for (const event of events) {
    if (event.timestamp.getTime() > max.getTime()) {
      max = event.timestamp;
    }
  }
  return max;
}

/** Applies authorship, release and tag rules to one repository's fetched events. */
function selectReportable(
  fetched: readonly ActivityEvent[],
  policy: ActivityPolicy,
  seenDrafts: Set<string>,
): ActivityEvent[] {
  const repoName = (ev: ActivityEvent) => fullName(ev.repo);

  let events = fetched.filter((ev) => {
    if (ev.isMine && !policy.myActivity) {
      log.info(
        { repo: repoName(ev), type: ev.type },
        "Event was created by current user, not reporting",
      );
      return false;
    }
    return true;
  });

  events = events.filter((ev) => {
    if (ev.type !== "release") return true;
    if (!ev.draft && seenDrafts.has(ev.id)) {
      log.info(
        { repo: repoName(ev), tag: ev.tagName },
        "Release was already seen as a draft, not reporting",
      );
      return false;
    }
    if (ev.prerelease && !policy.prereleases) {
      log.info({ repo: repoName(ev), tag: ev.tagName }, "Release is a prerelease, not reporting");
      return false;
    }
    if (ev.draft && !policy.drafts) {
      log.info({ repo: repoName(ev), tag: ev.tagName }, "Release is a draft, not reporting");
      return false;
    }
    return true;
  });

  // Only releases reported in this run hide their tag: publishing a draft
  // seen earlier reports the new tag alone.
  if (policy.releases && policy.tags && !policy.releasedTags) {
    const releaseTags = new Set(
      events.filter((ev): ev is ReleaseEvent => ev.type === "release").map((ev) => ev.tagName),
    );
    events = events.filter((ev) => {
      if (ev.type === "tag" && releaseTags.has(ev.name)) {
        log.info(
          { repo: repoName(ev), tag: ev.name },
          "Tag also present as a release, not reporting",
        );
        return false;
      }
      return true;
    });
  }

  return events;
}

/**
 * Computes the events that are new since `previous` and the state to persist
 * afterwards. `previous` is not modified.
 */
export async function diff(input: DiffInput): Promise<DiffResult> {
  const { previous, now } = input;
  const notices: LifecycleNotice[] = [];
  const nextState: TrackingState = {};
  const plans: RepoPlan[] = [];
  const handled = new Set<string>();

  for (const tracked of input.tracked) {
    const { repo, policy } = tracked;
    const types = enabledTypes(policy);
    if (types.length === 0) {
      log.info({ repo: fullName(repo) }, "No tracked activity configured");
      continue;
    }
    if (handled.has(repo.id)) {
      continue;
    }
    handled.add(repo.id);

    const old = previous[repo.id];
    if (old === undefined) {
      log.info({ repo: fullName(repo) }, "Now tracking");
      notices.push({ type: "tracked", timestamp: now, repo });
      const cutoffs: RepoTrackingRecord["cutoffs"] = {};
      for (const type of types) {
        cutoffs[type] = now;
      }
      nextState[repo.id] = { owner: repo.owner, name: repo.name, cutoffs, seenDraftReleaseIds: [] };
      continue;
    }

    if (old.owner !== repo.owner || old.name !== repo.name) {
      log.info({ from: fullName(old), to: fullName(repo) }, "Repository renamed");
      notices.push({
        type: "renamed",
        timestamp: now,
        repo,
        oldRepo: { id: repo.id, owner: old.owner, name: old.name },
      });
    }
    plans.push({ tracked, types, previous: old });
  }

  const units: FetchUnit[] = [];
  plans.forEach((plan, planIndex) => {
    for (const type of plan.types) {
      const after = plan.previous.cutoffs[type];
      if (after !== undefined) {
        units.push({ planIndex, type, after });
      }
    }
  });

  const outcomes = await mapWithConcurrency(
    units,
    input.concurrency ?? DEFAULT_CONCURRENCY,
    (unit) => fetchUnit(input.source, plans[unit.planIndex], unit),
  );

  const outcomesByPlan = plans.map(() => new Map<ActivityType, FetchOutcome>());
  units.forEach((unit, i) => outcomesByPlan[unit.planIndex].set(unit.type, outcomes[i]));

  const events: ActivityEvent[] = [];
  plans.forEach((plan, planIndex) => {
    const { repo, policy } = plan.tracked;
    const cutoffs: RepoTrackingRecord["cutoffs"] = {};
    const fetched: ActivityEvent[] = [];

    for (const type of plan.types) {
      const after = plan.previous.cutoffs[type];
      if (after === undefined) {
        log.info(
          { repo: fullName(repo), type },
          "Activity type newly tracked, starting cutoff now",
        );
        cutoffs[type] = now;
        continue;
      }
      const outcome = outcomesByPlan[planIndex].get(type);
      if (outcome === undefined || !outcome.ok) {
        cutoffs[type] = after;
        continue;
      }
      cutoffs[type] = latest(after, outcome.events);
      fetched.push(...outcome.events);
    }

    const previouslySeen = new Set(plan.previous.seenDraftReleaseIds);
    const seenDrafts = new Set(previouslySeen);
    if (plan.types.includes("release")) {
      for (const ev of fetched) {
        if (ev.type === "release" && ev.draft) {
          seenDrafts.add(ev.id);
        }
      }
    }

    events.push(...selectReportable(fetched, policy, previouslySeen));
    nextState[repo.id] = {
      owner: repo.owner,
      name: repo.name,
      cutoffs,
      seenDraftReleaseIds: [...seenDrafts],
    };
  });

  for (const [id, old] of Object.entries(previous)) {
    if (!handled.has(id)) {
      log.info({ repo: fullName(old) }, "Did not encounter repository, no longer tracking");
      notices.push({
        type: "untracked",
        timestamp: now,
        repo: { id, owner: old.owner, name: old.name },
      });
    }
  }

  return { events, notices, nextState };
}
