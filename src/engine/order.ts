import type { ActivityEvent, LifecycleNotice, ReportItem } from "../tracking/types.js";

/**
 * Oldest first. Ties keep their input order: events before notices, and
 * events in the order they were produced.
 */
export function orderReport(
  events: readonly ActivityEvent[],
  notices: readonly LifecycleNotice[],
): ReportItem[] {
  const items: ReportItem[] = [...events, ...notices];
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => a.item.timestamp.getTime() - b.item.timestamp.getTime() || a.index - b.index)
    .map(({ item }) => item);
}
