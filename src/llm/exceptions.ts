export class ModelError extends Error {}

export class ModelProviderError extends ModelError {
  constructor(
    message: string,
    public statusCode = 502,
    public model: string | null = null,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ModelProviderError';
  }
}

export class ModelRateLimitError extends ModelProviderError {
  constructor(
    message: string,
    statusCode = 429,
    model: string | null = null,
    options?: ErrorOptions
  ) {
    super(message, statusCode, model, options);
    this.name = 'ModelRateLimitError';
  }
}

const statusOf = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  return typeof error.status === 'number' ? error.status : null;
};

/**
 * Wraps an SDK or transport failure; errors carrying an HTTP status keep it.
 */
export function toModelError(error: unknown, model: string): ModelProviderError {
  if (error instanceof ModelProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);
  if (status === 429) {
    return new ModelRateLimitError(message, 429, model, { cause: error });
  }
  return new ModelProviderError(message, status ?? 502, model, {
    cause: error,
  });
}
