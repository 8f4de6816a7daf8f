/**
 * Base class for errors raised by cinefeed itself.
 */
export class CinefeedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Render/network timeout or navigation failure. Resolved to an empty result.
 */
export class TransientFetchError extends CinefeedError {
  constructor(
    readonly target: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Cache backend failure. Downgraded to a miss or a no-op.
 */
export class CacheBackendError extends CinefeedError {}

/**
 * Persisted state that cannot be parsed. Treated as an empty state.
 */
export class StateCorruptionError extends CinefeedError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Invalid or incomplete configuration. Fatal to the affected job only.
 */
export class ConfigurationError extends CinefeedError {}

/**
 * Uncaught failure inside a job, caught at the job boundary.
 */
export class JobError extends CinefeedError {
  constructor(
    readonly job: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
