/**
 * Spotify Web API client.
 *
 * Authenticates with the client-credentials flow and reads the public
 * artist profile and the artist's top tracks in the US market.
 */

import { requestJson } from './http';
import { ClientCredentialsToken } from './oauth';
import { spotifyArtistSchema, spotifyTopTracksSchema } from './schemas';
import type { ArtistSummary, PlatformClient, PlatformClientOptions } from './types';

export const SPOTIFY_API_URL = 'https://api.spotify.com/v1';
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
}

export class SpotifyClient implements PlatformClient {
  readonly platform = 'spotify' as const;
  private readonly token: ClientCredentialsToken;

  constructor(
    credentials: SpotifyCredentials,
    private readonly options: PlatformClientOptions = {}
  ) {
    this.token = new ClientCredentialsToken({
      platform: this.platform,
      tokenUrl: SPOTIFY_TOKEN_URL,
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      credentialsIn: 'basic',
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetchImpl,
      now: options.now,
    });
  }

  async fetchArtistProfile(id: string): Promise<ArtistSummary> {
    return this.token.authorize((accessToken) => this.fetchWithToken(id, accessToken));
  }

  private async fetchWithToken(id: string, accessToken: string): Promise<ArtistSummary> {
    const request = {
      platform: this.platform,
      headers: { Authorization: `Bearer ${accessToken}` },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    };
    const artistUrl = `${SPOTIFY_API_URL}/artists/${encodeURIComponent(id)}`;

    const artist = await requestJson(artistUrl, spotifyArtistSchema, request);
    const topTracks = await requestJson(`${artistUrl}/top-tracks`, spotifyTopTracksSchema, {
      ...request,
      query: { country: 'US' },
    });

    return {
      platform: this.platform,
      id: artist.id,
      name: artist.name,
      followers: artist.followers?.total ?? null,
      popularity: artist.popularity ?? null,
      genres: artist.genres,
      imageUrl: artist.images[0]?.url ?? null,
      totalPlays: null,
      topTracks: topTracks.tracks.map((track) => ({
        id: track.id,
        name: track.name,
        album: track.album?.name ?? null,
        popularity: track.popularity ?? null,
        durationMs: track.duration_ms ?? null,
      })),
    };
  }
}
