/**
 * Apple Music API client.
 *
 * Requests are authorised with a developer token: an ES256 JWT signed with
 * the MusicKit private key. The token is reused until it expires.
 */

import jwt from 'jsonwebtoken';
import { requestJson } from './http';
import { appleArtistsSchema, appleSongsSchema } from './schemas';
import { PlatformError, type ArtistSummary, type PlatformClient, type PlatformClientOptions } from './types';

export const APPLE_MUSIC_API_URL = 'https://api.music.apple.com/v1';

/** Developer token lifetime (seconds) */
export const DEVELOPER_TOKEN_TTL_SECONDS = 15 * 60;

/** Storefront used for catalogue lookups */
const STOREFRONT = 'us';

/** Artwork URLs are templates with {w} and {h} placeholders */
const ARTWORK_SIZE = 300;

export interface AppleMusicCredentials {
  keyId: string;
  teamId: string;
  /** PKCS#8 PEM; literal "\n" sequences are accepted for single-line env vars */
  privateKey: string;
}

/**
 * Fills in the size placeholders of an Apple artwork URL.
 */
export function resolveArtworkUrl(template: string, size: number = ARTWORK_SIZE): string {
  return template.replace('{w}', String(size)).replace('{h}', String(size));
}

export class AppleMusicClient implements PlatformClient {
  readonly platform = 'apple-music' as const;
  private developerToken: string | null = null;
  private tokenExpiresAt = 0;
  private readonly now: () => number;

  constructor(
    private readonly credentials: AppleMusicCredentials,
    private readonly options: PlatformClientOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the cached developer token, signing a new one when it has
   * expired.
   *
   * @throws PlatformError of type `authentication` when the key cannot sign
   */
  getDeveloperToken(): string {
    if (this.developerToken && this.now() < this.tokenExpiresAt) {
      return this.developerToken;
    }

    const issuedAt = Math.floor(this.now() / 1000);
    try {
      this.developerToken = jwt.sign(
        { iat: issuedAt, exp: issuedAt + DEVELOPER_TOKEN_TTL_SECONDS },
        this.credentials.privateKey.replace(/\\n/g, '\n'),
        {
          algorithm: 'ES256',
          keyid: this.credentials.keyId,
          issuer: this.credentials.teamId,
        }
      );
    } catch (error) {
      throw new PlatformError(
        'Failed to sign the Apple Music developer token. Check APPLE_MUSIC_PRIVATE_KEY.',
        'authentication',
        error instanceof Error ? error : undefined,
        this.platform
      );
    }

    this.tokenExpiresAt = (issuedAt + DEVELOPER_TOKEN_TTL_SECONDS) * 1000;
    return this.developerToken;
  }

  async fetchArtistProfile(id: string): Promise<ArtistSummary> {
    const request = {
      platform: this.platform,
      headers: { Authorization: `Bearer ${this.getDeveloperToken()}` },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    };
    const artistUrl = `${APPLE_MUSIC_API_URL}/catalog/${STOREFRONT}/artists/${encodeURIComponent(id)}`;

    const artists = await requestJson(artistUrl, appleArtistsSchema, request);
    const artist = artists.data[0];
    if (!artist) {
      throw new PlatformError(`Apple Music artist '${id}' not found`, 'not_found', undefined, this.platform);
    }

    const songs = await requestJson(`${artistUrl}/view/top-songs`, appleSongsSchema, request);

    return {
      platform: this.platform,
      id: artist.id,
      name: artist.attributes.name,
      // The catalogue API exposes no follower or popularity figures
      followers: null,
      popularity: null,
      genres: artist.attributes.genreNames,
      imageUrl: artist.attributes.artwork ? resolveArtworkUrl(artist.attributes.artwork.url) : null,
      totalPlays: null,
      topTracks: songs.data.map((song) => ({
        id: song.id,
        name: song.attributes.name,
        album: song.attributes.albumName ?? null,
        popularity: null,
        durationMs: song.attributes.durationInMillis ?? null,
      })),
    };
  }
}
