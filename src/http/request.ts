import type { z } from 'zod';
import type { HttpRequest, HttpResponse, HttpTransport } from './transport.js';
import {
  NetworkError,
  ProtocolError,
  describeErrorBody,
  formatIssues,
} from '../utils/errors.js';

export const CONTENT_TYPE_HEADER = 'Content-Type';
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';
export const AUTHORIZATION_HEADER = 'Authorization';

/**
 * Per-call options accepted by every client operation.
 */
export interface RequestOptions {
  /** Cancels the call; the operation then fails with a cancelled NetworkError */
  signal?: AbortSignal;
}

/**
 * Sends a request and returns the body of a 2xx answer.
 *
 * @param transport - Transport to send the request through.
 * @param request - The fully built request.
 * @param context - Operation name used in error messages (e.g. 'mediaItems.search').
 * @throws NetworkError if the signal is already aborted or the transport fails.
 * @throws ProtocolError if the remote answers with a non-2xx status.
 */
export async function execute(
  transport: HttpTransport,
  request: HttpRequest,
  context: string,
): Promise<string> {
  if (request.signal?.aborted) {
    throw new NetworkError(`${context} was cancelled before the request was sent`, 'cancelled');
  }

  let response: HttpResponse;
  try {
    response = await transport.send(request);
  } catch (error) {
    if (error instanceof NetworkError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`${context} failed: ${message}`, 'transport', { cause: error });
  }

  if (response.status < 200 || response.status >= 300) {
    throw new ProtocolError(
      `${context} failed (${response.status}): ${describeErrorBody(response.body)}`,
      { status: response.status, body: response.body },
    );
  }

  return response.body;
}

/**
 * Parses a JSON body and validates it against a schema.
 *
 * @throws ProtocolError if the body is not JSON or does not match the schema.
 */
export function decodeJson<S extends z.ZodTypeAny>(body: string, schema: S, context: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError(`${context} returned a body that is not valid JSON`, { body }, { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ProtocolError(`${context} returned an unexpected payload: ${formatIssues(result.error)}`, { body });
  }
  return result.data;
}
