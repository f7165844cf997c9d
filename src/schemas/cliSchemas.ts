import { z } from 'zod';
import { CONTENT_CATEGORIES, MEDIA_TYPES } from '../api/types.js';

/**
 * Zod schemas for command-line arguments.
 * Commander hands over strings; numbers are coerced and enum names upper-cased here.
 */

const DATE_PATTERN = /^[1-9]\d{3}(-(0?[1-9]|1[0-2])(-(0?[1-9]|[12]\d|3[01]))?)?$/;

const dateArgument = z.string().regex(DATE_PATTERN, 'Expected YYYY, YYYY-MM or YYYY-MM-DD');

const contentCategory = z
  .string()
  .transform(value => value.toUpperCase())
  .pipe(z.enum(CONTENT_CATEGORIES));

const mediaType = z
  .string()
  .transform(value => value.toUpperCase())
  .pipe(z.enum(MEDIA_TYPES));

export const searchOptionsSchema = z
  .object({
    category: z.array(contentCategory).default([]),
    excludeCategory: z.array(contentCategory).default([]),
    mediaType: mediaType.optional(),
    favorites: z.boolean().default(false),
    date: z.array(dateArgument).default([]),
    from: dateArgument.optional(),
    to: dateArgument.optional(),
    includeArchived: z.boolean().default(false),
    appCreatedOnly: z.boolean().default(false),
    album: z.string().trim().min(1, 'Album ID cannot be empty').optional(),
    pageSize: z.coerce.number().int().min(1).max(100).default(100),
    pages: z.coerce.number().int().min(1).default(1),
    format: z.enum(['urls', 'json']).default('urls'),
  })
  .refine(options => (options.from === undefined) === (options.to === undefined), {
    message: '--from and --to must be given together',
    path: ['from'],
  })
  .refine(
    options =>
      options.album === undefined ||
      (options.category.length === 0 &&
        options.excludeCategory.length === 0 &&
        options.mediaType === undefined &&
        !options.favorites &&
        options.date.length === 0 &&
        options.from === undefined &&
        !options.includeArchived &&
        !options.appCreatedOnly),
    {
      message: '--album cannot be combined with filters',
      path: ['album'],
    },
  );

export type SearchOptions = z.infer<typeof searchOptionsSchema>;
export type OutputFormat = SearchOptions['format'];
