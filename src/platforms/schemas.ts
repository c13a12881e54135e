/**
 * Response schemas for the platform APIs.
 *
 * Only the fields the adapters read are declared; zod strips the rest.
 */

import { z } from 'zod';

// ============================================================================
// OAuth
// ============================================================================

/** Client-credentials token response (Spotify and Login with Amazon) */
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().int().positive().default(3600),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

// ============================================================================
// Spotify
// ============================================================================

const spotifyImageSchema = z.object({
  url: z.string(),
  height: z.number().nullable().optional(),
  width: z.number().nullable().optional(),
});

export const spotifyArtistSchema = z.object({
  id: z.string(),
  name: z.string(),
  followers: z.object({ total: z.number() }).optional(),
  popularity: z.number().optional(),
  genres: z.array(z.string()).default([]),
  images: z.array(spotifyImageSchema).default([]),
});

export const spotifyTopTracksSchema = z.object({
  tracks: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      popularity: z.number().optional(),
      duration_ms: z.number().optional(),
      album: z.object({ name: z.string() }).optional(),
    })
  ),
});

// ============================================================================
// Apple Music
// ============================================================================

const appleArtworkSchema = z.object({
  url: z.string(),
  width: z.number().optional(),
  height: z.number().optional(),
});

export const appleArtistsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({
        name: z.string(),
        genreNames: z.array(z.string()).default([]),
        artwork: appleArtworkSchema.optional(),
      }),
    })
  ),
});

export const appleSongsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({
        name: z.string(),
        albumName: z.string().optional(),
        durationInMillis: z.number().optional(),
      }),
    })
  ),
});

// ============================================================================
// YouTube
// ============================================================================

/** YouTube reports counts as decimal strings */
const countString = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal count')
  .transform((value) => Number(value));

const youtubeThumbnailSchema = z.object({ url: z.string() });

export const youtubeChannelsSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string(),
          thumbnails: z
            .object({
              default: youtubeThumbnailSchema.optional(),
              high: youtubeThumbnailSchema.optional(),
            })
            .optional(),
        }),
        statistics: z
          .object({
            subscriberCount: countString.optional(),
            viewCount: countString.optional(),
            videoCount: countString.optional(),
            hiddenSubscriberCount: z.boolean().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

// ============================================================================
// Amazon Music
// ============================================================================

export const amazonArtistSchema = z.object({
  id: z.string(),
  name: z.string(),
  followerCount: z.number().optional(),
  genres: z.array(z.string()).default([]),
  imageUrl: z.string().optional(),
  topTracks: z
    .array(
      z.object({
        id: z.string(),
        title: z.string(),
        durationMs: z.number().optional(),
        popularity: z.number().optional(),
      })
    )
    .default([]),
});
