/**
 * Typed error model for the radar pipeline.
 *
 * Every stage reports failure as a TypedError with a namespaced code so
 * logs and the HTTP layer can tell a transport failure from a corrupt
 * artifact or an unexpected grid layout.
 */

/** Typed suggested fix an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "FETCH.EXHAUSTED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed on a later request. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Stage error factory functions ---

export function fetchError(url: string, attempts: number, lastFailure: string, statusCode?: number): TypedError {
  return createTypedError({
    code: 'FETCH.EXHAUSTED',
    message: `Failed to download ${url} after ${attempts} attempt(s): ${lastFailure}`,
    retryable: true,
    details: statusCode !== undefined ? { url, attempts, statusCode } : { url, attempts },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: {}, description: 'The upstream source may be temporarily unavailable.' },
    ],
  });
}

export function extractError(path: string, reason: string): TypedError {
  return createTypedError({
    code: 'EXTRACT.CORRUPT',
    message: `Failed to decompress ${path}: ${reason}`,
    retryable: false,
    details: { path },
  });
}

export function decodeError(path: string, reason: string): TypedError {
  return createTypedError({
    code: 'DECODE.FAILED',
    message: `Failed to decode grid ${path}: ${reason}`,
    retryable: false,
    details: { path },
    suggestedFixes: [
      { type: 'CHECK_DECODER', params: {}, description: 'Verify the grid decoder is installed and supports this product.' },
    ],
  });
}

export function transformError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'TRANSFORM.NO_VARIABLES',
    message,
    retryable: false,
    details,
  });
}

export function invalidGridError(variable: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'TRANSFORM.INVALID_GRID',
    message: `Variable "${variable}": ${message}`,
    retryable: false,
    details: { variable, ...details },
  });
}

export function configError(variable: string, value: string, expected: string): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `Invalid value for ${variable}: "${value}" (expected ${expected})`,
    retryable: false,
    details: { variable, value },
    suggestedFixes: [
      { type: 'FIX_CONFIGURATION', params: { variable }, description: `Set ${variable} to ${expected}` },
    ],
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

/** API error response body. */
export interface ApiErrorResponse {
  error: string;
}

/** Log context for a typed error: code, retryability and the fixes an operator can apply. */
export function errorLogContext(error: TypedError): Record<string, unknown> {
  const context: Record<string, unknown> = { code: error.code, error: error.message, retryable: error.retryable };
  if (error.details) context.details = error.details;
  if (error.suggestedFixes.length > 0) {
    context.suggestedFixes = error.suggestedFixes.map((fix) => fix.description ?? fix.type);
  }
  return context;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error: error.message };
}
