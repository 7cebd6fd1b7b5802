import { z } from "zod";
import { AFFILIATIONS } from "../tracking/types.js";

const partialPolicyShape = {
  issues: z.boolean().optional(),
  pullRequests: z.boolean().optional(),
  discussions: z.boolean().optional(),
  releases: z.boolean().optional(),
  prereleases: z.boolean().optional(),
  drafts: z.boolean().optional(),
  tags: z.boolean().optional(),
  releasedTags: z.boolean().optional(),
  stars: z.boolean().optional(),
  forks: z.boolean().optional(),
  myActivity: z.boolean().optional(),
};

const partialPolicySchema = z.strictObject(partialPolicyShape);

const repoPolicySchema = z.strictObject({
  ...partialPolicyShape,
  include: z.boolean().default(true),
});

const activitySchema = z.strictObject({
  ...partialPolicyShape,
  affiliated: partialPolicySchema.default({}),
  repo: z.record(z.string(), repoPolicySchema).default({}),
});

const reposSchema = z.strictObject({
  affiliations: z
    .array(
      z.enum(AFFILIATIONS, { error: (issue) => `Unknown affiliation: ${String(issue.input)}` }),
    )
    .default([...AFFILIATIONS]),
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
});

export const settingsFileSchema = z.strictObject({
  title: z.string().min(1).default("[repo-herald] New activity on your GitHub repositories"),
  stateFile: z.string().min(1).default("state.json"),
  concurrency: z.number().int().min(1).max(32).optional(),
  repos: reposSchema.default({ affiliations: [...AFFILIATIONS], include: [], exclude: [] }),
  activity: activitySchema.default({ affiliated: {}, repo: {} }),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;
