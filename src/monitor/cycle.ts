import { diff } from "../engine/diff.js";
import { orderReport } from "../engine/order.js";
import { createLogger } from "../logger.js";
import type { Settings } from "../settings/load.js";
import type { StateStore } from "../state/store.js";
import type { Notifier } from "../telegram/sender.js";
import { dumpPolicies, policyFor, type TrackedRepo } from "../tracking/policy.js";
import { resolveRepoSet } from "../tracking/repo-set.js";
import type { ActivitySource, ReportItem } from "../tracking/types.js";

const log = createLogger("monitor:cycle");

export type CycleMode = "deliver" | "print" | "dumpRepos";

export interface CycleDeps {
  settings: Settings;
  source: ActivitySource;
  store: StateStore;
  notifier: Notifier;
  /** Receives --print and --dump-repos output. */
  write: (text: string) => void;
}

export interface CycleOptions {
  mode: CycleMode;
  save: boolean;
  concurrency?: number;
  now?: Date;
}

export interface CycleResult {
  items: ReportItem[];
  saved: boolean;
}

export async function resolveTracked(
  source: ActivitySource,
  settings: Settings,
): Promise<TrackedRepo[]> {
  const resolved = await resolveRepoSet(source, settings.selection);
  return resolved.map(({ repo, isAffiliated }) => ({
    repo,
    isAffiliated,
    policy: policyFor(repo, isAffiliated, settings.policy),
  }));
}

/**
 * One run: resolve the tracked repositories, work out what is new, report it,
 * then persist the new state. Any failure before the report is out leaves the
 * state file as it was.
 */
export async function runNewsCycle(deps: CycleDeps, options: CycleOptions): Promise<CycleResult> {
  const { settings, source, store, notifier } = deps;
  const now = options.now ?? new Date();

  if (options.mode === "dumpRepos") {
    const tracked = await resolveTracked(source, settings);
    deps.write(JSON.stringify(dumpPolicies(tracked), null, 4));
    return { items: [], saved: false };
  }

  const previous = await store.load();
  const tracked = await resolveTracked(source, settings);
  log.info({ repoCount: tracked.length }, "Resolved tracked repositories");

  const { events, notices, nextState } = await diff({
    tracked,
    previous,
    source,
    now,
    concurrency: options.concurrency ?? settings.concurrency,
  });
  const items = orderReport(events, notices);

  if (items.length === 0) {
    log.info("No new activity");
  } else if (options.mode === "print") {
    deps.write(notifier.render(items).join("\n\n"));
  } else {
    log.info({ itemCount: items.length }, "Sending report");
    await notifier.deliver(items);
  }

  if (!options.save) {
    log.info("Not saving state (--no-save)");
    return { items, saved: false };
  }
  await store.save(nextState);
  log.info(
    {
      eventCount: events.length,
      noticeCount: notices.length,
      repoCount: Object.keys(nextState).length,
    },
    "Cycle complete, state saved",
  );
  return { items, saved: true };
}
