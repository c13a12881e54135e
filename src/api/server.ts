/**
 * Artist Pulse API Server
 *
 * Serves the Hono app on Node through @hono/node-server.
 *
 * Features:
 * - Automatic port discovery (finds available port if preferred is in use)
 * - Configuration validated before startup
 * - Graceful shutdown on SIGINT / SIGTERM
 *
 * Usage:
 *   npm start
 *
 * Environment Variables:
 *   PORT - Preferred port (default: 3000)
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   NODE_ENV - Environment mode (development/production/test)
 *   ALLOWED_ORIGINS - Comma-separated list of allowed CORS origins
 */

import { createServer } from 'node:net';
import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { configuredPlatforms } from '../platforms';
import { createApp, createDefaultDependencies } from './app';

/** Ports tried after the preferred one before giving up */
const PORT_SEARCH_RANGE = 100;

/**
 * Finds an available port starting from the preferred port.
 *
 * Binds a throwaway server to each candidate and moves on to the next
 * port when the bind fails.
 *
 * @throws Error if no port in the range is free
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = preferredPort + PORT_SEARCH_RANGE
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const probe = createServer();
      probe.once('error', () => resolve(false));
      probe.listen(port, config.server.host, () => {
        probe.close(() => resolve(true));
      });
    });
    if (free) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

async function startServer(): Promise<void> {
  validateConfig();

  const port = await findAvailablePort(config.server.port);
  const app = createApp(createDefaultDependencies(config));
  const platforms = configuredPlatforms(config.platforms);

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
    console.log('');
    console.log('╔═══════════════════════════════════════════════════════════╗');
    console.log('║                 Artist Pulse API Server                   ║');
    console.log('╚═══════════════════════════════════════════════════════════╝');
    console.log(`[Server] Listening on http://localhost:${info.port}`);
    console.log(`[Server] Environment: ${config.server.nodeEnv}`);
    console.log(`[Server] Sample seed: ${config.data.sampleSeed ?? 'random, drawn at startup'}`);
    console.log(`[Server] Platforms: ${platforms.length > 0 ? platforms.join(', ') : 'none configured'}`);
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
