// errors.ts - Error Types and Factory Functions

// =============================================================================
// CODES & CATEGORIES
// =============================================================================

export type RunnerProviderErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENT'
  | 'INVALID_SPEC'
  | 'UNSUPPORTED_PLATFORM'
  | 'UNSUPPORTED_OS_TYPE'
  | 'EMPTY_USER_DATA'
  | 'NOT_FOUND'
  | 'CANCELLED'
  | 'PROVIDER_ERROR';

export type ErrorCategory = 'validation' | 'not_found' | 'cancelled' | 'provider';

export function categorizeErrorCode(code: RunnerProviderErrorCode): ErrorCategory {
  switch (code) {
    case 'NOT_FOUND':
      return 'not_found';
    case 'CANCELLED':
      return 'cancelled';
    case 'PROVIDER_ERROR':
      return 'provider';
    default:
      return 'validation';
  }
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for every failure the provider surfaces to the orchestrator */
export class RunnerProviderError extends Error {
  readonly code: RunnerProviderErrorCode;
  readonly category: ErrorCategory;
  readonly operation?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: RunnerProviderErrorCode,
    message: string,
    options?: {
      operation?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RunnerProviderError';
    this.code = code;
    this.category = categorizeErrorCode(code);
    this.operation = options?.operation;
    this.details = options?.details;
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

export function invalidSpec(message: string, cause?: unknown): RunnerProviderError {
  return new RunnerProviderError('INVALID_SPEC', message, { cause });
}

export function invalidArgument(message: string): RunnerProviderError {
  return new RunnerProviderError('INVALID_ARGUMENT', message);
}

export function notFound(resourceType: string, resourceId: string, cause?: unknown): RunnerProviderError {
  return new RunnerProviderError('NOT_FOUND', `${resourceType} not found: ${resourceId}`, {
    details: { resourceType, resourceId },
    cause,
  });
}

// =============================================================================
// HELPERS
// =============================================================================

export function isRunnerProviderError(err: unknown): err is RunnerProviderError {
  return err instanceof RunnerProviderError;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof RunnerProviderError && err.code === 'NOT_FOUND';
}

/**
 * Attach an operation name to a failure. A RunnerProviderError keeps its code
 * and is re-issued with the operation prefixed to its message; anything else
 * becomes PROVIDER_ERROR with the original as cause.
 */
export function wrapWithOperation(operation: string, err: unknown): RunnerProviderError {
  if (err instanceof RunnerProviderError) {
    if (err.operation === operation) return err;
    return new RunnerProviderError(err.code, `${operation}: ${err.message}`, {
      operation,
      details: err.details,
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RunnerProviderError('PROVIDER_ERROR', `${operation}: ${message}`, {
    operation,
    cause: err,
  });
}

/** Run fn, wrapping any failure with the operation name. */
export async function withOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw wrapWithOperation(operation, err);
  }
}
