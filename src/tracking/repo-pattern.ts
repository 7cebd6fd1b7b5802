import { ConfigError } from "../errors.js";
import type { RepoRef } from "./types.js";

const OWNER_RGX = /^(?=.{1,39}$)[A-Za-z0-9](?:-?[A-Za-z0-9])*$/;
const NAME_RGX = /^[A-Za-z0-9._-]+$/;

/** `owner/name`, or `owner/*` for every repository under an owner. */
export class RepoPattern {
  private constructor(
    readonly owner: string,
    readonly name: string | null,
  ) {}

  static parse(value: string): RepoPattern {
    const slash = value.indexOf("/");
    if (slash === -1) {
      throw new ConfigError(`Invalid repo pattern: "${value}"`);
    }
    const owner = value.slice(0, slash);
    const name = value.slice(slash + 1);
    if (!OWNER_RGX.test(owner)) {
      throw new ConfigError(`Invalid repo pattern: "${value}"`);
    }
    if (name === "*") {
      return new RepoPattern(owner, null);
    }
    if (!NAME_RGX.test(name) || name === "." || name === "..") {
      throw new ConfigError(`Invalid repo pattern: "${value}"`);
    }
    return new RepoPattern(owner, name);
  }

  static exact(owner: string, name: string): RepoPattern {
    return new RepoPattern(owner, name);
  }

  static ownerWildcard(owner: string): RepoPattern {
    return new RepoPattern(owner, null);
  }

  get isWildcard(): boolean {
    return this.name === null;
  }

  matches(repo: Pick<RepoRef, "owner" | "name">): boolean {
    if (this.owner.toLowerCase() !== repo.owner.toLowerCase()) {
      return false;
    }
    return this.name === null || this.name.toLowerCase() === repo.name.toLowerCase();
  }

  /** Case-insensitive key, equal for patterns GitHub treats as the same. */
  key(): string {
    return this.toString().toLowerCase();
  }

  toString(): string {
    return `${this.owner}/${this.name ?? "*"}`;
  }
}
