/** Invalid settings, environment or CLI usage. Raised before any network call. */
export class ConfigError extends Error {
  readonly name = "ConfigError" as const;
}

/** Connection failure, timeout or 5xx from GitHub; worth retrying. */
export class TransientFetchError extends Error {
  readonly name = "TransientFetchError" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Authentication failure, malformed query or any other non-retryable API error. */
export class FatalFetchError extends Error {
  readonly name = "FatalFetchError" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends Error {
  readonly name = "NotFoundError" as const;
}

export class StateCorruptionError extends Error {
  readonly name = "StateCorruptionError" as const;

  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`State file ${filePath} is unusable: ${message}`, options);
  }
}

export class DeliveryError extends Error {
  readonly name = "DeliveryError" as const;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
