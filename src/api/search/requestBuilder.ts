import type {
  CalendarDate,
  ContentCategory,
  ContentFilter,
  DateFilter,
  SearchFilters,
  SearchRequest,
} from '../types.js';
import type { SearchOptions } from '../../schemas/cliSchemas.js';

/**
 * Builds search requests from validated command-line options
 */

/**
 * Parses `YYYY`, `YYYY-MM` or `YYYY-MM-DD` into a calendar date, leaving out
 * the parts that are not given.
 *
 * @param value - A date string already checked against the CLI date pattern.
 */
export function parseCalendarDate(value: string): CalendarDate {
  const [year, month, day] = value.split('-').map(part => parseInt(part, 10));
  const date: CalendarDate = { year };
  if (month !== undefined) {
    date.month = month;
  }
  if (day !== undefined) {
    date.day = day;
  }
  return date;
}

function unique(categories: ContentCategory[]): ContentCategory[] {
  return [...new Set(categories)];
}

/**
 * Builds the filter tree, or undefined when no filter was requested.
 */
export function buildFilters(options: SearchOptions): SearchFilters | undefined {
  const filters: SearchFilters = {};

  const included = unique(options.category);
  const excluded = unique(options.excludeCategory);
  if (included.length > 0 || excluded.length > 0) {
    const contentFilter: ContentFilter = {};
    if (included.length > 0) {
      contentFilter.includedContentCategories = included;
    }
    if (excluded.length > 0) {
      contentFilter.excludedContentCategories = excluded;
    }
    filters.contentFilter = contentFilter;
  }

  const dateFilter: DateFilter = {};
  if (options.date.length > 0) {
    dateFilter.dates = options.date.map(parseCalendarDate);
  }
  if (options.from !== undefined && options.to !== undefined) {
    dateFilter.ranges = [{ startDate: parseCalendarDate(options.from), endDate: parseCalendarDate(options.to) }];
  }
  if (dateFilter.dates || dateFilter.ranges) {
    filters.dateFilter = dateFilter;
  }

  if (options.mediaType) {
    filters.mediaTypeFilter = { mediaTypes: [options.mediaType] };
  }

  if (options.favorites) {
    filters.featureFilter = { includedFeatures: ['FAVORITES'] };
  }

  if (options.includeArchived) {
    filters.includeArchivedMedia = true;
  }
  if (options.appCreatedOnly) {
    filters.excludeNonAppCreatedData = true;
  }

  return Object.keys(filters).length > 0 ? filters : undefined;
}

/**
 * Builds the first search request for a run.
 *
 * @param options - Validated command-line options.
 */
export function buildSearchRequest(options: SearchOptions): SearchRequest {
  const request: SearchRequest = { pageSize: options.pageSize };

  if (options.album) {
    request.albumId = options.album;
    return request;
  }

  const filters = buildFilters(options);
  if (filters) {
    request.filters = filters;
  }
  return request;
}
