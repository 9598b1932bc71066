/**
 * Error types surfaced by the task runner
 */

/**
 * A required credential, endpoint, task or setting is missing or invalid.
 * Raised before a run starts.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string | null = null,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The log directory could not be created or is not writable.
 */
export class FilesystemError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'FilesystemError';
  }
}

/**
 * The structured run log could not be written. Never thrown out of the
 * run logger, only reported.
 */
export class ExportError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to write run log ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'ExportError';
  }
}
