import { describe, expect, it } from "vitest";
import { StateDecodeError, decodeState, encodeState } from "./codec.js";
import type { TrackingState } from "./schema.js";

describe("state codec", () => {
  it("encodes records sorted by id with ISO cutoffs", () => {
    const state: TrackingState = {
      R_b: {
        owner: "acme",
        name: "gadget",
        cutoffs: { star: new Date("2024-05-02T10:00:00Z") },
        seenDraftReleaseIds: [],
      },
      R_a: {
        owner: "acme",
        name: "widget",
        cutoffs: {
          issue: new Date("2024-05-01T12:30:00Z"),
          release: new Date("2024-04-30T08:00:00Z"),
        },
        seenDraftReleaseIds: ["RE_2", "RE_1"],
      },
    };

    expect(encodeState(state)).toBe(
      `${JSON.stringify(
        {
          R_a: {
            owner: "acme",
            name: "widget",
            cutoffs: { issue: "2024-05-01T12:30:00.000Z", release: "2024-04-30T08:00:00.000Z" },
            seenDraftReleaseIds: ["RE_1", "RE_2"],
          },
          R_b: {
            owner: "acme",
            name: "gadget",
            cutoffs: { star: "2024-05-02T10:00:00.000Z" },
            seenDraftReleaseIds: [],
          },
        },
        null,
        2,
      )}\n`,
    );
  });

  it("decodes what it encodes", () => {
    const state: TrackingState = {
      R_a: {
        owner: "acme",
        name: "widget",
        cutoffs: { tag: new Date("2024-05-01T00:00:00Z") },
        seenDraftReleaseIds: ["RE_1"],
      },
    };
    expect(decodeState(encodeState(state))).toEqual(state);
  });

  it("accepts offsets and a missing draft list", () => {
    const state = decodeState(
      JSON.stringify({ R_a: { owner: "acme", name: "widget", cutoffs: { fork: "2024-05-01T02:00:00+02:00" } } }),
    );
    expect(state.R_a.cutoffs.fork?.toISOString()).toBe("2024-05-01T00:00:00.000Z");
    expect(state.R_a.seenDraftReleaseIds).toEqual([]);
  });

  it("rejects invalid JSON", () => {
    expect(() => decodeState("{")).toThrow(StateDecodeError);
    expect(() => decodeState("{")).toThrow(/^invalid JSON: /);
  });

  it("rejects a record with a bad timestamp and names where", () => {
    const text = JSON.stringify({ R_a: { owner: "acme", name: "widget", cutoffs: { issue: "yesterday" } } });
    expect(() => decodeState(text)).toThrow(/^invalid schema at R_a\.cutoffs\.issue: /);
  });

  it("rejects a record without an owner", () => {
    expect(() => decodeState(JSON.stringify({ R_a: { name: "widget", cutoffs: {} } }))).toThrow(
      /^invalid schema at R_a\.owner: /,
    );
  });
});
