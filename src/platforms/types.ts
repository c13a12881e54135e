/**
 * Platform Adapter Types
 *
 * Common shapes for the streaming-platform clients. Each platform returns a
 * different payload; the adapters validate it and map it onto ArtistSummary
 * so the rest of the application never sees platform-specific JSON.
 */

/** Streaming platforms with an adapter */
export const PLATFORM_NAMES = ['spotify', 'apple-music', 'youtube', 'amazon-music'] as const;

export type PlatformName = (typeof PLATFORM_NAMES)[number];

/**
 * Type guard for platform names taken from URLs or CLI arguments.
 */
export function isPlatformName(value: string): value is PlatformName {
  return PLATFORM_NAMES.some((name) => name === value);
}

/** A track in an artist's top-tracks list */
export interface TrackSummary {
  id: string;
  name: string;
  album: string | null;
  /** Platform popularity score (0-100) where the platform reports one */
  popularity: number | null;
  durationMs: number | null;
}

/**
 * Platform-independent artist profile.
 *
 * Fields a platform does not report are null rather than 0, so a
 * missing statistic is never mistaken for a real one.
 */
export interface ArtistSummary {
  platform: PlatformName;
  id: string;
  name: string;
  followers: number | null;
  popularity: number | null;
  genres: string[];
  imageUrl: string | null;
  /** Lifetime plays or views, where the platform exposes them */
  totalPlays: number | null;
  topTracks: TrackSummary[];
}

/**
 * A client for one streaming platform's public API.
 */
export interface PlatformClient {
  readonly platform: PlatformName;

  /**
   * Fetches an artist (or channel) and maps it to an ArtistSummary.
   *
   * @throws PlatformError on authentication, lookup or transport failure
   */
  fetchArtistProfile(id: string): Promise<ArtistSummary>;
}

/**
 * Error types that can occur when calling a platform API.
 */
export type PlatformErrorType =
  | 'not_configured'    // Credentials missing from the configuration
  | 'authentication'    // Token request or credentials rejected
  | 'not_found'         // Unknown artist or channel
  | 'rate_limited'      // Too many requests
  | 'network'           // Connection failure, timeout or 5xx
  | 'invalid_response'; // Body was not JSON or failed validation

/**
 * Custom error class for platform API failures.
 */
export class PlatformError extends Error {
  type: PlatformErrorType;
  /** Platform that raised the error, when known */
  platform?: PlatformName;
  /** The original error that was caught, if any */
  cause?: Error;

  constructor(message: string, type: PlatformErrorType, cause?: Error, platform?: PlatformName) {
    super(message);
    this.name = 'PlatformError';
    this.type = type;
    this.cause = cause;
    this.platform = platform;
  }
}

/** Options shared by every platform client */
export interface PlatformClientOptions {
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Replaces the global fetch, e.g. in tests */
  fetchImpl?: typeof fetch;
  /** Clock used for token expiry, in milliseconds since the epoch */
  now?: () => number;
}

/**
 * Credentials for every platform as read from the environment. A platform
 * is usable only when all of its fields are present.
 */
export interface PlatformCredentials {
  spotify: { clientId?: string; clientSecret?: string };
  appleMusic: { keyId?: string; teamId?: string; privateKey?: string };
  youtube: { apiKey?: string };
  amazonMusic: { clientId?: string; clientSecret?: string };
}
