import { describeError } from "../errors.js";
import { ACTIVITY_TYPES } from "../tracking/types.js";
import { stateFileSchema, type StateFile, type TrackingState } from "./schema.js";

export class StateDecodeError extends Error {
  readonly name = "StateDecodeError" as const;
}

export function decodeState(text: string): TrackingState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new StateDecodeError(`invalid JSON: ${describeError(err)}`);
  }

  const result = stateFileSchema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = (first ? first.path.map(String).join(".") : "") || "(root)";
    throw new StateDecodeError(`invalid schema at ${where}: ${first?.message ?? "unknown"}`);
  }

  const state: TrackingState = {};
  for (const [id, record] of Object.entries(result.data)) {
    const cutoffs: TrackingState[string]["cutoffs"] = {};
    for (const type of ACTIVITY_TYPES) {
      const value = record.cutoffs[type];
      if (value !== undefined) {
        cutoffs[type] = new Date(value);
      }
    }
    state[id] = {
      owner: record.owner,
      name: record.name,
      cutoffs,
      seenDraftReleaseIds: [...record.seenDraftReleaseIds],
    };
  }
  return state;
}

export function encodeState(state: TrackingState): string {
  const file: StateFile = {};
  for (const id of Object.keys(state).sort()) {
    const record = state[id];
    const cutoffs: StateFile[string]["cutoffs"] = {};
    for (const type of ACTIVITY_TYPES) {
      const value = record.cutoffs[type];
      if (value !== undefined) {
        cutoffs[type] = value.toISOString();
      }
    }
    file[id] = {
      owner: record.owner,
      name: record.name,
      cutoffs,
      seenDraftReleaseIds: [...record.seenDraftReleaseIds].sort(),
    };
  }
  return `${JSON.stringify(file, null, 2)}\n`;
}
