import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "yaml";
import { formatIssues } from "../config.js";
import { ConfigError, describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { PolicyConfig, RepoPolicyEntry } from "../tracking/policy.js";
import { RepoPattern } from "../tracking/repo-pattern.js";
import type { RepoSelection } from "../tracking/repo-set.js";
import { settingsFileSchema } from "./schema.js";

const log = createLogger("settings");

export interface Settings {
  title: string;
  /** Absolute path; relative values in the file are resolved against its directory. */
  stateFile: string;
  concurrency: number | undefined;
  selection: RepoSelection;
  policy: PolicyConfig;
}

function parseRepoTable(
  table: Record<string, { include: boolean } & RepoPolicyEntry["prefs"]>,
): RepoPolicyEntry[] {
  const entries = new Map<string, RepoPolicyEntry>();
  for (const [spec, { include, ...prefs }] of Object.entries(table)) {
    const pattern = RepoPattern.parse(spec);
    if (entries.has(pattern.key())) {
      throw new ConfigError(`activity.repo lists ${spec} more than once`);
    }
    entries.set(pattern.key(), { pattern, prefs, include });
  }
  return [...entries.values()];
}

export function parseSettings(text: string, baseDir: string): Settings {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new ConfigError(`Settings file is not valid YAML: ${describeError(err)}`);
  }

  const result = settingsFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Settings validation failed:\n${formatIssues(result.error.issues)}`);
  }

  const { title, stateFile, concurrency, repos, activity } = result.data;
  const { affiliated, repo, ...global } = activity;
  const entries = parseRepoTable(repo);

  return {
    title,
    stateFile: path.resolve(baseDir, stateFile),
    concurrency,
    selection: {
      affiliations: repos.affiliations,
      include: repos.include.map((spec) => RepoPattern.parse(spec)),
      exclude: repos.exclude.map((spec) => RepoPattern.parse(spec)),
      implicitInclude: entries.filter((e) => e.include).map((e) => e.pattern),
    },
    policy: { global, affiliated, repos: entries },
  };
}

export async function loadSettings(filePath: string): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read settings file ${filePath}: ${describeError(err)}`);
  }
  const settings = parseSettings(text, path.dirname(path.resolve(filePath)));
  log.debug({ filePath, stateFile: settings.stateFile }, "Settings loaded");
  return settings;
}
