import axios, { type AxiosInstance } from 'axios';
import https from 'https';
import { NetworkError } from '../utils/errors.js';

const DEFAULT_TIMEOUT_MS = 5000;

export type HttpMethod = 'GET' | 'POST';

/**
 * A single outbound request. The body is already serialized.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Aborts the in-flight request when signalled */
  signal?: AbortSignal;
}

/**
 * Raw answer from the remote. Status codes are not interpreted here.
 */
export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Sends HTTP requests on behalf of the OAuth and Photos Library clients.
 * Implementations own timeouts and connection reuse; the clients own status
 * checking and decoding.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Converts an axios failure into a NetworkError of the matching kind.
 *
 * @param error - The original error object.
 * @param context - A string describing what request failed.
 */
export function toNetworkError(error: unknown, context: string): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new NetworkError(`${context} was cancelled`, 'cancelled', { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(`${context} timed out: ${error.message}`, 'timeout', { cause: error });
    }
    return new NetworkError(
      `${context} failed${error.code ? ` (${error.code})` : ''}: ${error.message}`,
      'transport',
      { cause: error },
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`${context} failed: ${message}`, 'transport', { cause: error });
}

/**
 * Creates an axios instance for Google endpoints.
 *
 * @param options.timeoutMs - Per-request timeout in milliseconds.
 */
export function createHttpClient(options: { timeoutMs: number }): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    // Keep-alive so the token and search calls reuse one TCP connection per host
    httpsAgent: new https.Agent({
      keepAlive: true,
      keepAliveMsecs: 30000,
      maxSockets: 10,
      maxFreeSockets: 2,
    }),
  });
}

/**
 * Wraps an axios instance as an HttpTransport. Every status resolves; bodies
 * are returned as raw text.
 *
 * @param instance - The axios instance to send requests with; defaults to
 *   {@link createHttpClient} with a 5 second timeout.
 */
export function createAxiosTransport(
  instance: AxiosInstance = createHttpClient({ timeoutMs: DEFAULT_TIMEOUT_MS }),
): HttpTransport {
  return {
    async send(request: HttpRequest): Promise<HttpResponse> {
      try {
        const response = await instance.request<string>({
          method: request.method,
          url: request.url,
          headers: request.headers,
          data: request.body,
          signal: request.signal,
          responseType: 'text',
          transformRequest: [(data: unknown) => data],
          transformResponse: [(data: unknown) => data],
          validateStatus: () => true,
        });

        return {
          status: response.status,
          body: typeof response.data === 'string' ? response.data : '',
        };
      } catch (error) {
        throw toNetworkError(error, `${request.method} ${request.url}`);
      }
    },
  };
}
