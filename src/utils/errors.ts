import { z } from 'zod';

/**
 * Error taxonomy shared by the OAuth and Photos Library clients.
 */

export type NetworkErrorKind = 'transport' | 'timeout' | 'cancelled';

/**
 * The request never produced an HTTP response: connection failure, timeout or
 * cancellation through an AbortSignal.
 */
export class NetworkError extends Error {
  readonly kind: NetworkErrorKind;

  constructor(message: string, kind: NetworkErrorKind = 'transport', options?: ErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
    this.kind = kind;
  }

  get cancelled(): boolean {
    return this.kind === 'cancelled';
  }
}

/**
 * A request body could not be serialized locally.
 */
export class EncodingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EncodingError';
  }
}

/**
 * The remote answered with a non-success status or a body that does not match
 * the expected shape.
 */
export class ProtocolError extends Error {
  /** HTTP status, when the failure is a non-2xx answer */
  readonly status?: number;
  /** Raw response body as received */
  readonly body?: string;

  constructor(message: string, details: { status?: number; body?: string } = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
    this.status = details.status;
    this.body = details.body;
  }
}

/**
 * The consent step was repeated without the provider issuing a refresh token.
 */
export class AuthorizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthorizationError';
  }
}

/**
 * Invalid command-line arguments or missing configuration.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// Google API error envelope: {"error": {"code": 401, "message": "...", "status": "UNAUTHENTICATED"}}
const apiErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    status: z.string().optional(),
  }),
});

// OAuth2 token endpoint error: {"error": "invalid_grant", "error_description": "..."}
const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

const MAX_BODY_EXCERPT = 200;

/**
 * Extracts a human-readable reason from an error response body.
 *
 * @param body - Raw response body.
 * @returns The provider's message when the body is a known error envelope, otherwise a trimmed excerpt.
 */
export function describeErrorBody(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) {
    return 'empty response body';
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}...` : trimmed;
  }

  const apiError = apiErrorSchema.safeParse(parsed);
  if (apiError.success) {
    const { message, status } = apiError.data.error;
    return status ? `${status}: ${message}` : message;
  }

  const oauthError = oauthErrorSchema.safeParse(parsed);
  if (oauthError.success) {
    const { error, error_description: description } = oauthError.data;
    return description ? `${error}: ${description}` : error;
  }

  return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}...` : trimmed;
}

/**
 * Formats zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

/**
 * Renders any thrown value as a single log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
