import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { AFFILIATIONS } from "../tracking/types.js";
import { loadSettings, parseSettings } from "./load.js";

const BASE_DIR = path.resolve("/srv/herald");

describe("parseSettings", () => {
  it("fills in defaults for an empty file", () => {
    const settings = parseSettings("", BASE_DIR);
    expect(settings.title).toBe("[repo-herald] New activity on your GitHub repositories");
    expect(settings.stateFile).toBe(path.join(BASE_DIR, "state.json"));
    expect(settings.concurrency).toBeUndefined();
    expect(settings.selection.affiliations).toEqual([...AFFILIATIONS]);
    expect(settings.selection.include).toEqual([]);
    expect(settings.selection.exclude).toEqual([]);
    expect(settings.selection.implicitInclude).toEqual([]);
    expect(settings.policy).toEqual({ global: {}, affiliated: {}, repos: [] });
  });

  it("reads every section", () => {
    const settings = parseSettings(
      [
        "title: Repo news",
        "stateFile: /var/lib/herald/state.json",
        "concurrency: 8",
        "repos:",
        "  affiliations: [OWNER]",
        "  include: [acme/*, other/tool]",
        "  exclude: [acme/legacy]",
        "activity:",
        "  issues: false",
        "  affiliated:",
        "    myActivity: true",
        "  repo:",
        "    acme/widget:",
        "      releasedTags: true",
        "    acme/quiet:",
        "      include: false",
        "      stars: false",
      ].join("\n"),
      BASE_DIR,
    );

    expect(settings.title).toBe("Repo news");
    expect(settings.stateFile).toBe(path.resolve(BASE_DIR, "/var/lib/herald/state.json"));
    expect(settings.concurrency).toBe(8);
    expect(settings.selection.affiliations).toEqual(["OWNER"]);
    expect(settings.selection.include.map(String)).toEqual(["acme/*", "other/tool"]);
    expect(settings.selection.exclude.map(String)).toEqual(["acme/legacy"]);
    expect(settings.selection.implicitInclude.map(String)).toEqual(["acme/widget"]);
    expect(settings.policy.global).toEqual({ issues: false });
    expect(settings.policy.affiliated).toEqual({ myActivity: true });
    expect(settings.policy.repos.map((e) => [String(e.pattern), e.prefs, e.include])).toEqual([
      ["acme/widget", { releasedTags: true }, true],
      ["acme/quiet", { stars: false }, false],
    ]);
  });

  it("resolves a relative state file against the settings directory", () => {
    expect(parseSettings("stateFile: data/state.json", BASE_DIR).stateFile).toBe(
      path.join(BASE_DIR, "data", "state.json"),
    );
  });

  it("allows an empty affiliation list", () => {
    expect(parseSettings("repos:\n  affiliations: []", BASE_DIR).selection.affiliations).toEqual([]);
  });

  it("rejects unknown keys", () => {
    expect(() => parseSettings("activity:\n  comments: true", BASE_DIR)).toThrow(ConfigError);
    expect(() => parseSettings("colour: blue", BASE_DIR)).toThrow(/Settings validation failed/);
  });

  it("rejects an unknown affiliation", () => {
    expect(() => parseSettings("repos:\n  affiliations: [FRIEND]", BASE_DIR)).toThrow(
      "Unknown affiliation: FRIEND",
    );
  });

  it("rejects a malformed repository pattern", () => {
    expect(() => parseSettings("repos:\n  include: [not-a-pattern]", BASE_DIR)).toThrow(
      'Invalid repo pattern: "not-a-pattern"',
    );
    expect(() => parseSettings("activity:\n  repo:\n    bad//x: {}", BASE_DIR)).toThrow(ConfigError);
  });

  it("rejects the same repository listed twice under different case", () => {
    expect(() =>
      parseSettings("activity:\n  repo:\n    acme/widget: {}\n    ACME/Widget: {}", BASE_DIR),
    ).toThrow("activity.repo lists ACME/Widget more than once");
  });

  it("rejects non-boolean preferences", () => {
    expect(() => parseSettings("activity:\n  tags: sometimes", BASE_DIR)).toThrow(ConfigError);
  });

  it("rejects invalid YAML", () => {
    expect(() => parseSettings("repos: [unclosed", BASE_DIR)).toThrow(/not valid YAML/);
  });
});

describe("loadSettings", () => {
  it("reads the file and resolves paths beside it", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "repo-herald-settings-"));
    const file = path.join(dir, "herald.yaml");
    await writeFile(file, "title: From disk\n");

    const settings = await loadSettings(file);
    expect(settings.title).toBe("From disk");
    expect(settings.stateFile).toBe(path.join(dir, "state.json"));
  });

  it("reports a missing file as a configuration error", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "repo-herald-settings-"));
    await expect(loadSettings(path.join(dir, "missing.yaml"))).rejects.toThrow(ConfigError);
  });
});
