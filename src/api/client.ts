import type { z } from 'zod';
import type { HttpTransport } from '../http/transport.js';
import {
  AUTHORIZATION_HEADER,
  CONTENT_TYPE_HEADER,
  CONTENT_TYPE_JSON,
  decodeJson,
  execute,
  type RequestOptions,
} from '../http/request.js';
import { encodeJson } from './encoding.js';
import type { MediaItemsSearchResponse, SearchRequest } from './types.js';
import { mediaItemsSearchResponseSchema } from '../schemas/searchSchemas.js';
import logger from '../utils/logger.js';

export const PHOTOS_LIBRARY_BASE_URL = 'https://photoslibrary.googleapis.com/v1/';
export const MEDIA_ITEMS_SEARCH_ENDPOINT = 'mediaItems:search';

export interface MediaSearchClientOptions {
  transport: HttpTransport;
  /** Defaults to the Photos Library v1 endpoint */
  baseUrl?: string;
}

/**
 * Client for the Photos Library search endpoint, holding a single bearer token.
 *
 * The client never refreshes its token; renew it through a TokenAuthority and
 * pass the new value to {@link MediaSearchClient.setToken}.
 */
export class MediaSearchClient {
  private token: string;
  private readonly transport: HttpTransport;
  private readonly baseUrl: string;

  constructor(token: string, options: MediaSearchClientOptions) {
    this.token = token;
    this.transport = options.transport;
    const baseUrl = options.baseUrl ?? PHOTOS_LIBRARY_BASE_URL;
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  getToken(): string {
    return this.token;
  }

  setToken(token: string): void {
    this.token = token;
  }

  /**
   * Searches media items. Returns a single page; copy `nextPageToken` into the
   * next request's `pageToken` to continue.
   *
   * @param request - The search request (filters, albumId, pagination).
   * @param options - Per-call options such as an AbortSignal.
   * @throws NetworkError, EncodingError or ProtocolError.
   */
  async search(request: SearchRequest, options: RequestOptions = {}): Promise<MediaItemsSearchResponse> {
    const response = await this.request(
      MEDIA_ITEMS_SEARCH_ENDPOINT,
      request,
      mediaItemsSearchResponseSchema,
      options,
    );
    logger.debug(
      `mediaItems.search returned ${response.mediaItems.length} item(s)` +
      (response.nextPageToken ? ', more pages available' : ''),
    );
    return response;
  }

  /**
   * Authenticated JSON POST to an endpoint under the base URL.
   */
  private async request<S extends z.ZodTypeAny>(
    endpoint: string,
    body: unknown,
    schema: S,
    options: RequestOptions,
  ): Promise<z.output<S>> {
    const context = endpoint.replace(':', '.');
    const payload = encodeJson(body);
    logger.debug(`POST ${endpoint} ${payload}`);

    const responseBody = await execute(
      this.transport,
      {
        method: 'POST',
        url: `${this.baseUrl}${endpoint}`,
        headers: {
          [AUTHORIZATION_HEADER]: `Bearer ${this.token}`,
          [CONTENT_TYPE_HEADER]: CONTENT_TYPE_JSON,
        },
        body: payload,
        signal: options.signal,
      },
      context,
    );

    return decodeJson(responseBody, schema, context);
  }
}
