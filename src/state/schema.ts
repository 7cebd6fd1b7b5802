import { z } from "zod";
import type { ActivityType } from "../tracking/types.js";

const timestampSchema = z.iso.datetime({ offset: true });

const repoRecordSchema = z.object({
  owner: z.string(),
  name: z.string(),
  cutoffs: z
    .object({
      issue: timestampSchema,
      pullRequest: timestampSchema,
      discussion: timestampSchema,
      release: timestampSchema,
      tag: timestampSchema,
      star: timestampSchema,
      fork: timestampSchema,
    })
    .partial(),
  seenDraftReleaseIds: z.array(z.string()).default([]),
});

/** On-disk form: one record per repository node id. */
export const stateFileSchema = z.record(z.string(), repoRecordSchema);

export type StateFile = z.infer<typeof stateFileSchema>;

export interface RepoTrackingRecord {
  owner: string;
  name: string;
  /** Only events strictly after the cutoff are reported for that type. */
  cutoffs: Partial<Record<ActivityType, Date>>;
  seenDraftReleaseIds: string[];
}

/** Keyed by repository node id. */
export type TrackingState = Record<string, RepoTrackingRecord>;
