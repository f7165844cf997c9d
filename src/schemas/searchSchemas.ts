import { z } from 'zod';

/**
 * Zod schemas for Photos Library responses.
 * Every field is optional on the wire; an absent field means "not present".
 */

export const photoMetadataSchema = z.object({
  cameraMake: z.string().optional(),
  cameraModel: z.string().optional(),
  focalLength: z.number().optional(),
  apertureFNumber: z.number().optional(),
  isoEquivalent: z.number().optional(),
  exposureTime: z.string().optional(),
});

export const videoMetadataSchema = z.object({
  cameraMake: z.string().optional(),
  cameraModel: z.string().optional(),
  fps: z.number().optional(),
  /** UNSPECIFIED, PROCESSING, READY or FAILED */
  status: z.string().optional(),
});

export const mediaMetadataSchema = z.object({
  creationTime: z.string().optional(),
  // int64 values arrive as strings
  width: z.string().optional(),
  height: z.string().optional(),
  photo: photoMetadataSchema.optional(),
  video: videoMetadataSchema.optional(),
});

export const contributorInfoSchema = z.object({
  profilePictureBaseUrl: z.string().optional(),
  displayName: z.string().optional(),
});

export const mediaItemSchema = z.object({
  id: z.string().optional(),
  description: z.string().optional(),
  /** URL to view the item in the Google Photos web interface */
  productUrl: z.string().optional(),
  /** Time-limited URL to the bytes */
  baseUrl: z.string().optional(),
  mimeType: z.string().optional(),
  mediaMetadata: mediaMetadataSchema.optional(),
  contributorInfo: contributorInfoSchema.optional(),
  filename: z.string().optional(),
});

export const mediaItemsSearchResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  mediaItems: z.array(mediaItemSchema).default([]),
});

export type PhotoMetadata = z.infer<typeof photoMetadataSchema>;
export type VideoMetadata = z.infer<typeof videoMetadataSchema>;
export type MediaMetadata = z.infer<typeof mediaMetadataSchema>;
export type ContributorInfo = z.infer<typeof contributorInfoSchema>;
export type MediaItem = z.infer<typeof mediaItemSchema>;
export type MediaItemsSearchResponse = z.infer<typeof mediaItemsSearchResponseSchema>;
