/**
 * Streaming Platform Adapters
 *
 * Clients for the public APIs of Spotify, Apple Music, YouTube and Amazon
 * Music. Use createPlatformClient() to build a client from configured
 * credentials; every client returns the same ArtistSummary shape.
 *
 * @example
 * ```typescript
 * import { createPlatformClient } from './platforms';
 * import { config } from './config';
 *
 * const client = createPlatformClient('spotify', config.platforms, {
 *   timeoutMs: config.api.timeoutMs,
 *   cacheExpirySeconds: config.api.cacheExpirySeconds,
 * });
 * const artist = await client.fetchArtistProfile('artist-id');
 * ```
 */

import { AmazonMusicClient } from './amazon-music';
import { AppleMusicClient } from './apple-music';
import { CachedPlatformClient } from './cache';
import { SpotifyClient } from './spotify';
import { YouTubeClient } from './youtube';
import {
  PlatformError,
  type ArtistSummary,
  type PlatformClient,
  type PlatformClientOptions,
  type PlatformCredentials,
  type PlatformName,
} from './types';
import type { TableRow } from '../core/transform';

export * from './types';
export { requestJson, errorTypeForStatus, DEFAULT_TIMEOUT_MS } from './http';
export { TtlCache, CachedPlatformClient } from './cache';
export { ClientCredentialsToken } from './oauth';
export { SpotifyClient } from './spotify';
export { AppleMusicClient, resolveArtworkUrl } from './apple-music';
export { YouTubeClient } from './youtube';
export { AmazonMusicClient } from './amazon-music';

export interface CreatePlatformClientOptions extends PlatformClientOptions {
  /** Serve repeated lookups from memory for this many seconds; 0 disables */
  cacheExpirySeconds?: number;
}

/** Environment variables behind each platform's credentials */
export const PLATFORM_ENV_VARS: Record<PlatformName, readonly string[]> = {
  spotify: ['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET'],
  'apple-music': ['APPLE_MUSIC_KEY_ID', 'APPLE_MUSIC_TEAM_ID', 'APPLE_MUSIC_PRIVATE_KEY'],
  youtube: ['YOUTUBE_API_KEY'],
  'amazon-music': ['AMAZON_MUSIC_CLIENT_ID', 'AMAZON_MUSIC_CLIENT_SECRET'],
};

function notConfigured(platform: PlatformName): PlatformError {
  return new PlatformError(
    `${platform} is not configured. Set ${PLATFORM_ENV_VARS[platform].join(', ')}.`,
    'not_configured',
    undefined,
    platform
  );
}

function createUncachedClient(
  platform: PlatformName,
  credentials: PlatformCredentials,
  options: PlatformClientOptions
): PlatformClient {
  switch (platform) {
    case 'spotify': {
      const { clientId, clientSecret } = credentials.spotify;
      if (!clientId || !clientSecret) throw notConfigured(platform);
      return new SpotifyClient({ clientId, clientSecret }, options);
    }
    case 'apple-music': {
      const { keyId, teamId, privateKey } = credentials.appleMusic;
      if (!keyId || !teamId || !privateKey) throw notConfigured(platform);
      return new AppleMusicClient({ keyId, teamId, privateKey }, options);
    }
    case 'youtube': {
      const { apiKey } = credentials.youtube;
      if (!apiKey) throw notConfigured(platform);
      return new YouTubeClient(apiKey, options);
    }
    case 'amazon-music': {
      const { clientId, clientSecret } = credentials.amazonMusic;
      if (!clientId || !clientSecret) throw notConfigured(platform);
      return new AmazonMusicClient({ clientId, clientSecret }, options);
    }
  }
}

/**
 * Builds the client for a platform.
 *
 * @throws PlatformError of type `not_configured` when any credential is missing
 */
export function createPlatformClient(
  platform: PlatformName,
  credentials: PlatformCredentials,
  options: CreatePlatformClientOptions = {}
): PlatformClient {
  const { cacheExpirySeconds = 0, ...clientOptions } = options;
  const client = createUncachedClient(platform, credentials, clientOptions);
  return cacheExpirySeconds > 0 ? new CachedPlatformClient(client, cacheExpirySeconds, options.now) : client;
}

/**
 * Lists the platforms whose credentials are complete.
 */
export function configuredPlatforms(credentials: PlatformCredentials): PlatformName[] {
  const configured: PlatformName[] = [];
  if (credentials.spotify.clientId && credentials.spotify.clientSecret) configured.push('spotify');
  if (credentials.appleMusic.keyId && credentials.appleMusic.teamId && credentials.appleMusic.privateKey) {
    configured.push('apple-music');
  }
  if (credentials.youtube.apiKey) configured.push('youtube');
  if (credentials.amazonMusic.clientId && credentials.amazonMusic.clientSecret) configured.push('amazon-music');
  return configured;
}

/**
 * Flattens a summary into a table row for tabular export.
 * Genres are joined with ", " and only the top track's name is kept.
 */
export function artistSummaryToRow(summary: ArtistSummary): TableRow {
  return Object.freeze({
    platform: summary.platform,
    id: summary.id,
    name: summary.name,
    followers: summary.followers,
    popularity: summary.popularity,
    genres: summary.genres.join(', '),
    image_url: summary.imageUrl,
    total_plays: summary.totalPlays,
    top_track: summary.topTracks[0]?.name ?? null,
    top_track_count: summary.topTracks.length,
  });
}
