/**
 * Error taxonomy
 * Every failure is fatal to the run; these classes only carry enough
 * context for the CLI to name what went wrong and where.
 */

import type { PlatformErrorDetail } from './api/types.js';

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    message: string,
    readonly variables: string[] = []
  ) {
    super(message);
  }
}

export class AuthenticationError extends Error {
  override readonly name = 'AuthenticationError';

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export class ApiError extends Error {
  override readonly name = 'ApiError';

  constructor(
    message: string,
    readonly status: number,
    readonly method: string,
    readonly path: string,
    readonly errors: PlatformErrorDetail[] = []
  ) {
    super(message);
  }

  /**
   * The request carried a stale version
   */
  get isConcurrentModification(): boolean {
    return this.status === 409 || this.errors.some((e) => e.code === 'ConcurrentModification');
  }
}

export class RequestTimeoutError extends Error {
  override readonly name = 'RequestTimeoutError';

  constructor(
    readonly method: string,
    readonly path: string,
    readonly timeoutMs: number
  ) {
    super(`${method} ${path} timed out after ${timeoutMs}ms`);
  }
}

export class ExtractionError extends Error {
  override readonly name = 'ExtractionError';

  constructor(
    message: string,
    readonly field: string
  ) {
    super(message);
  }
}

export class ResponseCheckError extends Error {
  override readonly name = 'ResponseCheckError';
}

export class MissingReferenceError extends Error {
  override readonly name = 'MissingReferenceError';

  constructor(
    readonly reference: string,
    released: boolean
  ) {
    super(
      released
        ? `Reference "${reference}" was released by an earlier step and can no longer be used`
        : `Reference "${reference}" has not been produced by any earlier step`
    );
  }
}

export class PipelineStepError extends Error {
  override readonly name = 'PipelineStepError';

  constructor(
    readonly step: string,
    readonly index: number,
    override readonly cause: Error
  ) {
    super(`Step ${index} "${step}" failed: ${cause.message}`);
  }
}

export class SetupStepError extends Error {
  override readonly name = 'SetupStepError';

  constructor(
    readonly step: string,
    override readonly cause: Error
  ) {
    super(`Setup "${step}" failed: ${cause.message}`);
  }
}

/**
 * One-line diagnostic for the terminal
 */
export function describeError(error: unknown): string {
  if (error instanceof PipelineStepError || error instanceof SetupStepError) {
    return `${error.message}${statusSuffix(error.cause)}`;
  }
  if (error instanceof Error) {
    return `${error.message}${statusSuffix(error)}`;
  }
  return String(error);
}

function statusSuffix(error: Error): string {
  if (error instanceof ApiError) {
    const conflict = error.isConcurrentModification ? ', version conflict' : '';
    return ` (HTTP ${error.status} on ${error.method} ${error.path || '/'}${conflict})`;
  }
  if (error instanceof AuthenticationError && error.status !== undefined) {
    return ` (HTTP ${error.status})`;
  }
  return '';
}
