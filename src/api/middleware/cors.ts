/**
 * CORS Middleware for the Artist Pulse API
 *
 * The API is read-only, so cross-origin callers only need GET and the
 * preflight OPTIONS. In development the common local front-end dev server
 * ports are allowed; in production the origins come from ALLOWED_ORIGINS
 * (see config.cors.allowedOrigins), which validateConfig() requires.
 *
 * @example
 * ```typescript
 * app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

/**
 * Configuration options for CORS middleware
 */
export interface CorsConfig {
  /** Origins allowed to make cross-origin requests */
  allowedOrigins: string[];
  /** HTTP methods allowed for cross-origin requests */
  allowedMethods: string[];
  /** Headers allowed in cross-origin requests */
  allowedHeaders: string[];
  /** How long preflight responses can be cached (seconds) */
  maxAge: number;
}

/**
 * Default CORS configuration for local development.
 */
const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: [
    'http://localhost:5173', // Vite dev server
    'http://127.0.0.1:5173',
    'http://localhost:3000', // Next.js / CRA dev server
    'http://localhost:8501', // Streamlit
  ],
  allowedMethods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID'],
  maxAge: 86400, // 24 hours - preflight cache duration
};

/**
 * Creates a CORS middleware handler. Empty origin lists fall back to the
 * development defaults.
 */
export function corsMiddleware(
  config: Partial<CorsConfig> = {}
): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
    allowedOrigins:
      config.allowedOrigins && config.allowedOrigins.length > 0
        ? config.allowedOrigins
        : DEFAULT_CORS_CONFIG.allowedOrigins,
  };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    maxAge: finalConfig.maxAge,
  });
}

export { DEFAULT_CORS_CONFIG };
