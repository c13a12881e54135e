/**
 * Amazon Music client.
 *
 * Amazon offers no generally available public catalogue API. This client
 * authenticates through Login with Amazon and reads the closed-beta Web API
 * endpoint; the response shape is provisional and validated like the others.
 */

import { requestJson } from './http';
import { ClientCredentialsToken } from './oauth';
import { amazonArtistSchema } from './schemas';
import type { ArtistSummary, PlatformClient, PlatformClientOptions } from './types';

export const AMAZON_MUSIC_API_URL = 'https://api.music.amazon.dev/v1';
export const AMAZON_TOKEN_URL = 'https://api.amazon.com/auth/o2/token';

export interface AmazonMusicCredentials {
  clientId: string;
  clientSecret: string;
}

export class AmazonMusicClient implements PlatformClient {
  readonly platform = 'amazon-music' as const;
  private readonly token: ClientCredentialsToken;

  constructor(
    private readonly credentials: AmazonMusicCredentials,
    private readonly options: PlatformClientOptions = {}
  ) {
    this.token = new ClientCredentialsToken({
      platform: this.platform,
      tokenUrl: AMAZON_TOKEN_URL,
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      credentialsIn: 'body',
      extraForm: { scope: 'music::catalog' },
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetchImpl,
      now: options.now,
    });
  }

  async fetchArtistProfile(id: string): Promise<ArtistSummary> {
    return this.token.authorize((accessToken) => this.fetchWithToken(id, accessToken));
  }

  private async fetchWithToken(id: string, accessToken: string): Promise<ArtistSummary> {
    const artist = await requestJson(
      `${AMAZON_MUSIC_API_URL}/artists/${encodeURIComponent(id)}`,
      amazonArtistSchema,
      {
        platform: this.platform,
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'x-api-key': this.credentials.clientId,
        },
        timeoutMs: this.options.timeoutMs,
        fetchImpl: this.options.fetchImpl,
      }
    );

    return {
      platform: this.platform,
      id: artist.id,
      name: artist.name,
      followers: artist.followerCount ?? null,
      popularity: null,
      genres: artist.genres,
      imageUrl: artist.imageUrl ?? null,
      totalPlays: null,
      topTracks: artist.topTracks.map((track) => ({
        id: track.id,
        name: track.title,
        album: null,
        popularity: track.popularity ?? null,
        durationMs: track.durationMs ?? null,
      })),
    };
  }
}
