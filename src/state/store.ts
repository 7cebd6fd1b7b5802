import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import { StateCorruptionError, describeError } from "../errors.js";
import { StateDecodeError, decodeState, encodeState } from "./codec.js";
import type { TrackingState } from "./schema.js";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class StateStore {
  private filePath: string;
  private log: pino.Logger;

  constructor(filePath: string, logger: pino.Logger) {
    this.filePath = filePath;
    this.log = logger;
  }

  get path(): string {
    return this.filePath;
  }

  /** A missing file is a first run. Anything unreadable is fatal, never "empty". */
  async load(): Promise<TrackingState> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (isMissingFile(err)) {
        this.log.info({ filePath: this.filePath }, "State file not found, treating as empty");
        return {};
      }
      throw new StateCorruptionError(this.filePath, describeError(err), { cause: err });
    }

    try {
      const state = decodeState(content);
      this.log.info(
        { filePath: this.filePath, repoCount: Object.keys(state).length },
        "State loaded successfully",
      );
      return state;
    } catch (err) {
      if (err instanceof StateDecodeError) {
        throw new StateCorruptionError(this.filePath, err.message, { cause: err });
      }
      throw err;
    }
  }

  async save(state: TrackingState): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, encodeState(state), "utf-8");
    await rename(tempPath, this.filePath);
    this.log.debug({ filePath: this.filePath }, "State saved atomically");
  }
}
