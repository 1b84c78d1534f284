/**
 * Suite error utilities.
 *
 * Provides a consistent error type for the registry, hook execution and
 * configuration loading, plus helpers to convert arbitrary thrown values
 * into SuiteError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 *
 * Malformed tags are not errors and have no code: they fail open.
 */
export type SuiteErrorCode =
  | 'UnknownSuite'
  | 'DuplicateSuite'
  | 'PreSuiteFailed'
  | 'PostSuiteFailed'
  | 'ProviderResolution'
  | 'ConfigError'
  | 'ValidationError'
  | 'InvalidState';

/**
 * Plain shape of a SuiteError (for JSON output and logs).
 */
export interface SuiteErrorShape {
  code: SuiteErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class SuiteError extends Error implements SuiteErrorShape {
  public readonly code: SuiteErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SuiteErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SuiteError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): SuiteErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into SuiteError instances.
 *
 * @param error - Value thrown by a hook, decoder or loader
 * @param fallbackCode - Code to use when the value is not already a SuiteError
 */
export function toSuiteError(error: unknown, fallbackCode: SuiteErrorCode): SuiteError {
  if (error instanceof SuiteError) {
    return error;
  }

  if (error instanceof Error) {
    return new SuiteError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new SuiteError(fallbackCode, `Non-error value thrown: ${String(error)}`);
}

export function createUnknownSuiteError(name: string, known: readonly string[]): SuiteError {
  return new SuiteError('UnknownSuite', `Suite "${name}" does not exist`, {
    suite: name,
    available: [...known],
  });
}

export function createDuplicateSuiteError(name: string): SuiteError {
  return new SuiteError('DuplicateSuite', `Suite "${name}" is declared more than once`, {
    suite: name,
  });
}

/**
 * Wrap a PreSuite hook failure, keeping the original as `cause`.
 */
export function createPreSuiteError(suite: string, error: unknown): SuiteError {
  const reason = error instanceof Error ? error.message : String(error);
  return new SuiteError(
    'PreSuiteFailed',
    `Suite "${suite}" could not be prepared: ${reason}`,
    {
      suite,
      ...(error instanceof SuiteError ? { reasonCode: error.code } : {}),
    },
    { cause: error }
  );
}

/**
 * Convert a Zod validation error into a SuiteError.
 *
 * @example
 * ```typescript
 * const result = ProviderSpecSchema.safeParse({ type: '' });
 * if (!result.success) {
 *   throw zodErrorToSuiteError(result.error, 'ProviderResolution');
 * }
 * // Throws: "Validation error on field 'type': Cannot be empty"
 * ```
 */
export function zodErrorToSuiteError(
  error: ZodError,
  code: SuiteErrorCode = 'ValidationError'
): SuiteError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new SuiteError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
