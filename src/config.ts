/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the Artist Pulse API and CLI,
 * loaded from environment variables. The analytics core never reads it;
 * the server, CLI and platform adapters receive the values they need as
 * arguments.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.data.defaultDays);
 *
 *   // Validate configuration (throws if invalid)
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';
import { PLATFORM_ENV_VARS, PLATFORM_NAMES, type PlatformName } from './platforms';

// =============================================================================
// Configuration Schema
// =============================================================================

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // Sample data and dashboard defaults
  data: z.object({
    defaultDays: z.number().int().positive().default(30),
    /** Fixed seed for reproducible sample data; random when unset */
    sampleSeed: z.number().int().optional(),
    artistName: z.string().min(1).default('Sample Artist'),
  }),

  // Outbound platform API calls
  api: z.object({
    timeoutMs: z.number().int().positive().default(30000),
    cacheExpirySeconds: z.number().int().nonnegative().default(3600),
  }),

  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),

  platforms: z.object({
    spotify: z.object({
      clientId: z.string().optional(),
      clientSecret: z.string().optional(),
    }),
    appleMusic: z.object({
      keyId: z.string().optional(),
      teamId: z.string().optional(),
      privateKey: z.string().optional(),
    }),
    youtube: z.object({
      apiKey: z.string().optional(),
    }),
    amazonMusic: z.object({
      clientId: z.string().optional(),
      clientSecret: z.string().optional(),
    }),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/** Empty strings count as unset */
function optionalString(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Builds the raw configuration object from environment variables.
 * The result is untyped until it passes the schema.
 */
function loadFromEnvironment(env: Environment): unknown {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: optionalString(env.HOST),
      nodeEnv: optionalString(env.NODE_ENV),
    },
    data: {
      defaultDays: parseIntOrUndefined(env.DEFAULT_DAYS),
      sampleSeed: parseIntOrUndefined(env.SAMPLE_SEED),
      artistName: optionalString(env.ARTIST_NAME),
    },
    api: {
      timeoutMs: parseIntOrUndefined(env.API_TIMEOUT_MS),
      cacheExpirySeconds: parseIntOrUndefined(env.CACHE_EXPIRY_SECONDS),
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
    platforms: {
      spotify: {
        clientId: optionalString(env.SPOTIFY_CLIENT_ID),
        clientSecret: optionalString(env.SPOTIFY_CLIENT_SECRET),
      },
      appleMusic: {
        keyId: optionalString(env.APPLE_MUSIC_KEY_ID),
        teamId: optionalString(env.APPLE_MUSIC_TEAM_ID),
        privateKey: optionalString(env.APPLE_MUSIC_PRIVATE_KEY),
      },
      youtube: {
        apiKey: optionalString(env.YOUTUBE_API_KEY),
      },
      amazonMusic: {
        clientId: optionalString(env.AMAZON_MUSIC_CLIENT_ID),
        clientSecret: optionalString(env.AMAZON_MUSIC_CLIENT_SECRET),
      },
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses configuration from an environment map.
 *
 * @throws {ConfigValidationError} If a value fails the schema
 */
export function loadConfig(env: Environment = process.env): Config {
  const result = configSchema.safeParse(loadFromEnvironment(env));
  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      [],
      invalidVars
    );
  }
  return result.data;
}

/** Credential values per platform, in the order of PLATFORM_ENV_VARS */
function credentialValues(cfg: Config, platform: PlatformName): (string | undefined)[] {
  const { spotify, appleMusic, youtube, amazonMusic } = cfg.platforms;
  switch (platform) {
    case 'spotify':
      return [spotify.clientId, spotify.clientSecret];
    case 'apple-music':
      return [appleMusic.keyId, appleMusic.teamId, appleMusic.privateKey];
    case 'youtube':
      return [youtube.apiKey];
    case 'amazon-music':
      return [amazonMusic.clientId, amazonMusic.clientSecret];
  }
}

/**
 * Validates the configuration beyond what the schema can express.
 *
 * Always:
 * - platform credentials are all-or-nothing; a partly configured platform
 *   names each missing variable
 * - APPLE_MUSIC_PRIVATE_KEY must be a PEM private key
 *
 * In production mode ALLOWED_ORIGINS is also REQUIRED.
 *
 * @throws {ConfigValidationError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Missing vars:', error.missingVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(cfg: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  for (const platform of PLATFORM_NAMES) {
    const names = PLATFORM_ENV_VARS[platform];
    const values = credentialValues(cfg, platform);
    const setCount = values.filter((value) => value !== undefined).length;
    if (setCount > 0 && setCount < names.length) {
      names.forEach((name, i) => {
        if (values[i] === undefined) {
          invalidVars.push({ name, reason: `Required when other ${platform} credentials are set` });
        }
      });
    }
  }

  const privateKey = cfg.platforms.appleMusic.privateKey;
  if (privateKey && !privateKey.includes('PRIVATE KEY')) {
    invalidVars.push({
      name: 'APPLE_MUSIC_PRIVATE_KEY',
      reason: 'Expected a PEM-encoded private key',
    });
  }

  if (cfg.server.nodeEnv === 'production' && cfg.cors.allowedOrigins.length === 0) {
    missingVars.push('ALLOWED_ORIGINS');
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    const fullMessage = [
      '╔═══════════════════════════════════════════════════════════════════════╗',
      '║  CONFIGURATION ERROR                                                  ║',
      '╠═══════════════════════════════════════════════════════════════════════╣',
      `║  ${errorParts.join('\n║  ')}`,
      '║                                                                       ║',
      '║  Please check your environment variables or .env file.               ║',
      '╚═══════════════════════════════════════════════════════════════════════╝',
    ].join('\n');

    throw new ConfigValidationError(fullMessage, missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

function loadOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    console.error('Invalid configuration schema:');
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

/**
 * The validated, type-safe configuration object, loaded once at module
 * load time.
 *
 * @example
 * ```typescript
 * import { config } from './config';
 *
 * serve({ fetch: app.fetch, port: config.server.port });
 * ```
 */
export const config: Config = loadOrExit();

export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

export function isDevelopment(): boolean {
  return config.server.nodeEnv === 'development';
}

export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

export default config;
