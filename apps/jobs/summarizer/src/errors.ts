/** Upstream story listing could not be fetched. Fatal to the run. */
export class ProviderUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderUnavailableError";
  }
}

export class CommentFetchFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CommentFetchFailedError";
  }
}

/**
 * Model backend failed (transport, auth, timeout or non-2xx status).
 * Summarizers raise this and nothing else; whether it aborts the run or
 * degrades to basic mode is decided by the pipeline.
 */
export class BackendUnavailableError extends Error {
  constructor(
    readonly backend: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BackendUnavailableError";
  }
}

/** Invalid command-line or environment input. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
