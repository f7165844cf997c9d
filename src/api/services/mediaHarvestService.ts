import type { MediaSearchClient } from '../client.js';
import type { RequestOptions } from '../../http/request.js';
import type { MediaItem, SearchRequest } from '../types.js';
import logger from '../../utils/logger.js';

export type MediaSearcher = Pick<MediaSearchClient, 'search'>;

export interface HarvestOptions extends RequestOptions {
  /** Maximum number of pages to fetch (default: 1) */
  maxPages?: number;
}

export interface HarvestResult {
  mediaItems: MediaItem[];
  pages: number;
  /** Token to resume from when more pages remain */
  nextPageToken?: string;
}

/**
 * Collects search results page by page, copying each response's
 * nextPageToken into the following request.
 *
 * @param client - Client issuing the search calls.
 * @param request - First request; its pageToken, if any, is the starting point.
 * @param options - Page limit and cancellation signal.
 */
export async function collectMediaItems(
  client: MediaSearcher,
  request: SearchRequest,
  options: HarvestOptions = {},
): Promise<HarvestResult> {
  const maxPages = options.maxPages ?? 1;
  const mediaItems: MediaItem[] = [];
  let pageToken = request.pageToken;
  let pages = 0;

  while (pages < maxPages) {
    const response = await client.search({ ...request, pageToken }, { signal: options.signal });
    pages++;
    mediaItems.push(...response.mediaItems);
    pageToken = response.nextPageToken;

    logger.info(`Fetched page ${pages}: ${response.mediaItems.length} item(s)`);
    if (!pageToken) {
      break;
    }
  }

  return { mediaItems, pages, nextPageToken: pageToken };
}
