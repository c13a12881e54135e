/**
 * Platform API Endpoint Tests
 *
 * Endpoints tested:
 * - GET /api/platforms
 * - GET /api/platforms/:platform/artists/:id
 *
 * Upstream calls go to a fetch stand-in; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestContext, createTestApp } from '../setup';
import { getJsonResponse, assertError, assertSuccess } from '../helpers';
import type { ApiErrorResponse, ApiResponse } from '../../src/api/types';
import type { PlatformStatus } from '../../src/api/routes';
import type { ArtistSummary } from '../../src/platforms';

const channel = {
  id: 'UC123',
  snippet: {
    title: 'Test Artist',
    thumbnails: { default: { url: 'https://yt.example/d.jpg' } },
  },
  statistics: { subscriberCount: '48000', viewCount: '9100000', hiddenSubscriberCount: false },
};

function youtubeFetch(respond: () => Response) {
  const urls: URL[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    urls.push(new URL(input instanceof Request ? input.url : String(input)));
    return respond();
  };
  return { fetchImpl, urls };
}

function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('Platforms API', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /api/platforms', () => {
    it('should report which platforms are configured', async () => {
      const app = createTestApp(createTestContext({ credentials: { youtube: { apiKey: 'test-key' } } }));

      const response = await app.request('/api/platforms');
      const body = await getJsonResponse<ApiResponse<PlatformStatus[]>>(response);

      expect(response.status).toBe(200);
      assertSuccess(body);
      expect(body.data).toEqual([
        { platform: 'spotify', configured: false },
        { platform: 'apple-music', configured: false },
        { platform: 'youtube', configured: true },
        { platform: 'amazon-music', configured: false },
      ]);
    });
  });

  describe('GET /api/platforms/:platform/artists/:id', () => {
    it('should return the artist summary', async () => {
      const { fetchImpl, urls } = youtubeFetch(() => json({ items: [channel] }));
      const app = createTestApp(
        createTestContext({ credentials: { youtube: { apiKey: 'test-key' } }, fetchImpl })
      );

      const response = await app.request('/api/platforms/youtube/artists/UC123');
      const body = await getJsonResponse<ApiResponse<ArtistSummary>>(response);

      expect(response.status).toBe(200);
      expect(body.data).toEqual({
        platform: 'youtube',
        id: 'UC123',
        name: 'Test Artist',
        followers: 48000,
        popularity: null,
        genres: [],
        imageUrl: 'https://yt.example/d.jpg',
        totalPlays: 9100000,
        topTracks: [],
      });
      expect(urls[0].searchParams.get('id')).toBe('UC123');
    });

    it('should reuse cached lookups when a cache expiry is set', async () => {
      const { fetchImpl, urls } = youtubeFetch(() => json({ items: [channel] }));
      const app = createTestApp(
        createTestContext({
          credentials: { youtube: { apiKey: 'test-key' } },
          fetchImpl,
          cacheExpirySeconds: 60,
        })
      );

      await app.request('/api/platforms/youtube/artists/UC123');
      await app.request('/api/platforms/youtube/artists/UC123');

      expect(urls).toHaveLength(1);
    });

    it('should return 503 when the platform is not configured', async () => {
      const app = createTestApp(createTestContext());

      const response = await app.request('/api/platforms/spotify/artists/abc');
      const body = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(503);
      assertError(body, 'PLATFORM_NOT_CONFIGURED');
      expect(body.error.message).toBe('spotify is not configured. Set SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET.');
      expect(body.error.details).toEqual({ platform: 'spotify' });
    });

    it('should return 404 when the platform has no such artist', async () => {
      const { fetchImpl } = youtubeFetch(() => json({ items: [] }));
      const app = createTestApp(
        createTestContext({ credentials: { youtube: { apiKey: 'test-key' } }, fetchImpl })
      );

      const response = await app.request('/api/platforms/youtube/artists/UCnone');
      const body = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(404);
      assertError(body, 'NOT_FOUND');
      expect(body.error.message).toBe("YouTube channel 'UCnone' not found");
    });

    it('should return 502 when the platform fails', async () => {
      const { fetchImpl } = youtubeFetch(() => new Response('unavailable', { status: 500 }));
      const app = createTestApp(
        createTestContext({ credentials: { youtube: { apiKey: 'test-key' } }, fetchImpl })
      );

      const response = await app.request('/api/platforms/youtube/artists/UC123');
      const body = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(502);
      assertError(body, 'PLATFORM_UNAVAILABLE');
      expect(body.error.message).toBe('youtube responded with 500');
    });

    it('should reject an unknown platform', async () => {
      const app = createTestApp(createTestContext());

      const response = await app.request('/api/platforms/myspace/artists/abc');
      const body = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      assertError(body, 'VALIDATION_ERROR');
      expect(body.error.message).toBe('Invalid path parameters');
      expect(body.error.details).toEqual([expect.objectContaining({ path: 'platform' })]);
    });

    it('should reject artist IDs with unsupported characters', async () => {
      const app = createTestApp(createTestContext({ credentials: { youtube: { apiKey: 'test-key' } } }));

      const response = await app.request('/api/platforms/youtube/artists/a%20b');
      const body = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      expect(body.error.details).toEqual([
        { path: 'id', message: 'Artist ID contains unsupported characters' },
      ]);
    });
  });
});
