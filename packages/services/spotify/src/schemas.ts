// ABOUTME: Zod schemas for the Spotify Web API response shapes this service reads.
// ABOUTME: Only fields the views can reach are declared; everything else is stripped.

import { z } from 'zod';

export const ImageSchema = z.object({
  url: z.string(),
  width: z.number().nullable().optional(),
  height: z.number().nullable().optional(),
});

/**
 * Nested reference to another catalog object. Spotify always sends the id;
 * type and name are read when present.
 */
export const ItemRefSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  name: z.string().optional(),
});

export const FullArtistSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  name: z.string(),
  popularity: z.number(),
  genres: z.array(z.string()),
  images: z.array(ImageSchema),
});

export const SimpleAlbumSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  name: z.string(),
  album_type: z.string().optional(),
  artists: z.array(ItemRefSchema),
  release_date: z.string(),
  total_tracks: z.number().optional(),
  images: z.array(ImageSchema),
});

export const FullAlbumSchema = SimpleAlbumSchema.extend({
  popularity: z.number(),
  genres: z.array(z.string()),
  label: z.string(),
  total_tracks: z.number(),
});

export const SimpleTrackSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  name: z.string(),
  artists: z.array(ItemRefSchema),
  disc_number: z.number(),
  track_number: z.number(),
  duration_ms: z.number(),
});

export const FullTrackSchema = SimpleTrackSchema.extend({
  album: SimpleAlbumSchema,
  popularity: z.number(),
});

export const AudioFeaturesSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  danceability: z.number(),
  energy: z.number(),
  valence: z.number(),
});

export function pagingSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item),
    total: z.number(),
    next: z.string().nullable(),
  });
}

export const ClientTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().positive(),
  scope: z.string().optional(),
});

export const CredentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

export type RawImage = z.infer<typeof ImageSchema>;
export type RawItemRef = z.infer<typeof ItemRefSchema>;
export type RawFullArtist = z.infer<typeof FullArtistSchema>;
export type RawSimpleAlbum = z.infer<typeof SimpleAlbumSchema>;
export type RawFullAlbum = z.infer<typeof FullAlbumSchema>;
export type RawSimpleTrack = z.infer<typeof SimpleTrackSchema>;
export type RawFullTrack = z.infer<typeof FullTrackSchema>;
export type RawAudioFeatures = z.infer<typeof AudioFeaturesSchema>;
export type ClientTokenResponse = z.infer<typeof ClientTokenResponseSchema>;
export type Credentials = z.infer<typeof CredentialsSchema>;
