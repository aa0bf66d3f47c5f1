/**
 * Application error hierarchy.
 *
 * `expose` marks errors whose message is safe to return to the client.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number = 500,
    readonly expose: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, true);
    this.name = 'ValidationError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403, true);
    this.name = 'ForbiddenError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503, true);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * A third-party provider (vector index, completion API, credential minting) failed.
 * `retryable` is set for network errors and 5xx responses.
 */
export class UpstreamError extends AppError {
  constructor(
    readonly provider: string,
    message: string,
    readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(`${provider}: ${message}`, 502, true);
    this.name = 'UpstreamError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}
