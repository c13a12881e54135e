/**
 * YouTube Data API client. An artist is a channel; subscribers stand in for
 * followers and channel views for plays.
 */

import { requestJson } from './http';
import { youtubeChannelsSchema } from './schemas';
import { PlatformError, type ArtistSummary, type PlatformClient, type PlatformClientOptions } from './types';

export const YOUTUBE_API_URL = 'https://www.googleapis.com/youtube/v3';

export class YouTubeClient implements PlatformClient {
  readonly platform = 'youtube' as const;

  constructor(
    private readonly apiKey: string,
    private readonly options: PlatformClientOptions = {}
  ) {}

  async fetchArtistProfile(id: string): Promise<ArtistSummary> {
    const channels = await requestJson(`${YOUTUBE_API_URL}/channels`, youtubeChannelsSchema, {
      platform: this.platform,
      query: { part: 'snippet,statistics', id, key: this.apiKey },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });

    const channel = channels.items[0];
    if (!channel) {
      throw new PlatformError(`YouTube channel '${id}' not found`, 'not_found', undefined, this.platform);
    }

    const statistics = channel.statistics;
    const thumbnails = channel.snippet.thumbnails;

    return {
      platform: this.platform,
      id: channel.id,
      name: channel.snippet.title,
      followers: statistics && !statistics.hiddenSubscriberCount ? (statistics.subscriberCount ?? null) : null,
      popularity: null,
      genres: [],
      imageUrl: thumbnails?.high?.url ?? thumbnails?.default?.url ?? null,
      totalPlays: statistics?.viewCount ?? null,
      topTracks: [],
    };
  }
}
