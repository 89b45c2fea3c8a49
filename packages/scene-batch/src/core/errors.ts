/**
 * Scene Batch Error Types
 *
 * Errors that stop a run before or after the pool does its work. Per-scene
 * failures never surface as exceptions: they are SceneResult values.
 */

/**
 * Configuration file or flag value is invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null = null
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

/**
 * Scene list or metadata CSV cannot be read
 *
 * RECOVERY:
 * - Check that the scene list path is relative to the working directory
 * - Re-download the catalog CSV if it is truncated
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = 'CatalogError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogError);
    }
  }
}

/**
 * A progress tracker was used after its summary was produced
 */
export class TrackerFinalizedError extends Error {
  constructor(public readonly label: string) {
    super(`Progress tracker '${label}' is already finalized`);
    this.name = 'TrackerFinalizedError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrackerFinalizedError);
    }
  }
}
