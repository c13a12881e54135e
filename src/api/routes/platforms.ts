/**
 * Platform API Routes
 *
 * Live artist lookups against the streaming platforms' public APIs.
 *
 * Endpoints:
 * - GET /api/platforms - Known platforms and whether each is configured
 * - GET /api/platforms/:platform/artists/:id - Artist summary from one platform
 *
 * Clients are created on first use and kept for the router's lifetime, so
 * access tokens and cached lookups are shared between requests. Platform
 * failures surface through the error handler: 503 when unconfigured or
 * rate limited, 404 for unknown artists, 502 for other upstream errors.
 */

import { Hono } from 'hono';
import {
  PLATFORM_NAMES,
  configuredPlatforms,
  createPlatformClient,
  type CreatePlatformClientOptions,
  type PlatformClient,
  type PlatformCredentials,
  type PlatformName,
} from '../../platforms';
import { parseParams } from '../middleware/validate';
import { platformArtistParamsSchema } from '../types';
import { success } from '../utils/response';

export interface PlatformRoutesOptions {
  credentials: PlatformCredentials;
  clientOptions?: CreatePlatformClientOptions;
}

export interface PlatformStatus {
  platform: PlatformName;
  configured: boolean;
}

export function platformRoutes(options: PlatformRoutesOptions): Hono {
  const router = new Hono();
  const clients = new Map<PlatformName, PlatformClient>();

  function getClient(platform: PlatformName): PlatformClient {
    const existing = clients.get(platform);
    if (existing) {
      return existing;
    }
    const client = createPlatformClient(platform, options.credentials, options.clientOptions);
    clients.set(platform, client);
    return client;
  }

  router.get('/', (c) => {
    const configured = configuredPlatforms(options.credentials);
    const statuses: PlatformStatus[] = PLATFORM_NAMES.map((platform) => ({
      platform,
      configured: configured.includes(platform),
    }));
    return success(c, statuses);
  });

  router.get('/:platform/artists/:id', async (c) => {
    const { platform, id } = parseParams(c, platformArtistParamsSchema);
    const client = getClient(platform);

    console.log(`[Platform] Fetching ${platform} artist ${id}`);
    const summary = await client.fetchArtistProfile(id);
    return success(c, summary);
  });

  return router;
}
