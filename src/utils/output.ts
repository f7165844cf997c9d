import type { MediaItem } from '../api/types.js';
import type { OutputFormat } from '../schemas/cliSchemas.js';

/**
 * Renders search results for stdout.
 *
 * `urls` prints one product URL per line (items without one are skipped);
 * `json` prints the item list as indented JSON.
 */
export function formatMediaItems(items: MediaItem[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(items, null, 2);
  }

  return items
    .map(item => item.productUrl)
    .filter((url): url is string => Boolean(url))
    .join('\n');
}
