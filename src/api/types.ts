/**
 * Type definitions for the Photos Library mediaItems:search endpoint
 */

export const CONTENT_CATEGORIES = [
  'NONE',
  'LANDSCAPES',
  'RECEIPTS',
  'CITYSCAPES',
  'LANDMARKS',
  'SELFIES',
  'PEOPLE',
  'PETS',
  'WEDDINGS',
  'BIRTHDAYS',
  'DOCUMENTS',
  'TRAVEL',
  'ANIMALS',
  'FOOD',
  'SPORT',
  'NIGHT',
  'PERFORMANCES',
  'WHITEBOARDS',
  'SCREENSHOTS',
  'UTILITY',
  'ARTS',
  'CRAFTS',
  'FASHION',
  'HOUSES',
  'GARDENS',
  'FLOWERS',
  'HOLIDAYS',
] as const;

export const MEDIA_TYPES = ['ALL_MEDIA', 'VIDEO', 'PHOTO'] as const;

export const FEATURES = ['NONE', 'FAVORITES'] as const;

export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];
export type MediaType = (typeof MEDIA_TYPES)[number];
export type Feature = (typeof FEATURES)[number];

/**
 * Pagination cursor sent with every search
 */
export interface PageRequest {
  /** Page size (max 100) */
  pageSize?: number;
  /** Continuation token copied from the previous response's nextPageToken */
  pageToken?: string;
}

/**
 * A calendar date. Month and day may be left out (or 0) to match a whole
 * year or month.
 */
export interface CalendarDate {
  year?: number;
  month?: number;
  day?: number;
}

export interface DateRange {
  startDate?: CalendarDate;
  endDate?: CalendarDate;
}

/** Date filter: matches any of the dates or ranges */
export interface DateFilter {
  dates?: CalendarDate[];
  ranges?: DateRange[];
}

/** Content category filter */
export interface ContentFilter {
  includedContentCategories?: ContentCategory[];
  excludedContentCategories?: ContentCategory[];
}

/** Media type filter (photo/video) */
export interface MediaTypeFilter {
  mediaTypes?: MediaType[];
}

/** Feature filter (favorites) */
export interface FeatureFilter {
  includedFeatures?: Feature[];
}

/**
 * Filters applied to a search. Cannot be combined with an album id.
 */
export interface SearchFilters {
  dateFilter?: DateFilter;
  contentFilter?: ContentFilter;
  mediaTypeFilter?: MediaTypeFilter;
  featureFilter?: FeatureFilter;
  includeArchivedMedia?: boolean;
  excludeNonAppCreatedData?: boolean;
}

/**
 * Body of a mediaItems:search request.
 * Unset, empty and false fields are left out of the wire body.
 */
export interface SearchRequest extends PageRequest {
  /** Album ID to search within */
  albumId?: string;
  /** Search filters */
  filters?: SearchFilters;
}

export type {
  ContributorInfo,
  MediaItem,
  MediaItemsSearchResponse,
  MediaMetadata,
  PhotoMetadata,
  VideoMetadata,
} from '../schemas/searchSchemas.js';
