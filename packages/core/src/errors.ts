/**
 * @module @llmverify/core/errors
 * Failure taxonomy shared by every adapter and the engine.
 *
 * Probe failures travel as `TaxonomyError` values on results; the error
 * classes below are only thrown across API boundaries.
 */

export type ErrorKind =
  | 'unauthorized'
  | 'rate_limited'
  | 'server_error'
  | 'not_found'
  | 'transport'
  | 'parse'
  | 'queue_full'
  | 'unclassified';

export interface TaxonomyError {
  kind: ErrorKind;
  message: string;
  /** HTTP status, when the failure came from a response */
  status?: number;
  /** Provider's own error type (e.g. "invalid_request_error") */
  providerType?: string;
  /** Raw response body, truncated */
  raw?: string;
}

/**
 * Provider error fields extracted from a response body.
 */
export interface ProviderErrorBody {
  type?: string;
  message?: string;
}

const RAW_LIMIT = 512;

export function truncate(text: string, limit = RAW_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}…` : text;
}

/**
 * Map an HTTP status and body onto the taxonomy.
 * The status mapping is fixed; `extract` only contributes the provider's own
 * type/message for the message text and the unclassified case.
 */
export function classifyHttpError(
  status: number,
  body: string,
  extract: (body: string) => ProviderErrorBody | null,
): TaxonomyError {
  const providerError = extract(body);
  const detail = providerError?.message ?? truncate(body);
  const base = {
    status,
    raw: truncate(body),
    ...(providerError?.type !== undefined && { providerType: providerError.type }),
  };

  if (status === 401) {
    return { kind: 'unauthorized', message: `authentication failed: ${detail}`, ...base };
  }
  if (status === 429) {
    return { kind: 'rate_limited', message: `rate limit exceeded: ${detail}`, ...base };
  }
  if (status >= 500 && status <= 599) {
    return { kind: 'server_error', message: `server error: ${detail}`, ...base };
  }
  if (status === 404) {
    return { kind: 'not_found', message: `not found: ${detail}`, ...base };
  }
  if (providerError) {
    return {
      kind: 'unclassified',
      message: `API error (${providerError.type ?? 'unknown'}): ${providerError.message ?? ''}`,
      ...base,
    };
  }
  return { kind: 'unclassified', message: `HTTP ${status}: ${truncate(body)}`, ...base };
}

/**
 * Parse a body of the common `{ "error": { "type", "message" } }` shape.
 */
export function extractNestedError(body: string): ProviderErrorBody | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    return null;
  }
  const error = parsed.error;
  if (typeof error === 'string') {
    return { message: error };
  }
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const result: ProviderErrorBody = {};
  if ('type' in error && typeof error.type === 'string') {
    result.type = error.type;
  }
  if ('message' in error && typeof error.message === 'string') {
    result.message = error.message;
  }
  return result.type === undefined && result.message === undefined ? null : result;
}

/**
 * Describe a thrown fetch/stream failure as a transport error.
 */
export function transportError(error: unknown, timedOutAfterMs?: number): TaxonomyError {
  if (timedOutAfterMs !== undefined) {
    return { kind: 'transport', message: `timed out after ${timedOutAfterMs}ms` };
  }
  if (error instanceof Error) {
    const cause = error.cause;
    const code =
      typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
        ? cause.code
        : undefined;
    return {
      kind: 'transport',
      message: code ? `${error.message} (${code})` : error.message,
    };
  }
  return { kind: 'transport', message: String(error) };
}

/**
 * Error carrying a taxonomy classification.
 */
export class VerifierError extends Error {
  constructor(public readonly taxonomy: TaxonomyError) {
    super(taxonomy.message);
    this.name = 'VerifierError';
  }

  get kind(): ErrorKind {
    return this.taxonomy.kind;
  }
}
