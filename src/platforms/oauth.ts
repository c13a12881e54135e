/**
 * OAuth client-credentials tokens, fetched on demand and reused until they
 * are about to expire.
 */

import { requestJson } from './http';
import { tokenResponseSchema } from './schemas';
import { PlatformError, type PlatformName } from './types';

/** Tokens are renewed this long before their reported expiry */
const EXPIRY_MARGIN_MS = 60_000;

export interface ClientCredentialsOptions {
  platform: PlatformName;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  /**
   * `basic` sends the credentials in an Authorization header,
   * `body` sends them as form fields.
   */
  credentialsIn: 'basic' | 'body';
  /** Extra form fields, e.g. a scope */
  extraForm?: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export class ClientCredentialsToken {
  private accessToken: string | null = null;
  private expiresAt = 0;
  private readonly now: () => number;

  constructor(private readonly options: ClientCredentialsOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns a valid access token, requesting a new one when none is cached
   * or the cached one is within a minute of expiry.
   */
  async get(): Promise<string> {
    if (this.accessToken && this.now() < this.expiresAt) {
      return this.accessToken;
    }

    const { platform, clientId, clientSecret } = this.options;
    const form: Record<string, string> = { grant_type: 'client_credentials', ...this.options.extraForm };
    const headers: Record<string, string> = {};

    if (this.options.credentialsIn === 'basic') {
      const encoded = Buffer.from(`${clientId}:${clientSecret}`, 'utf-8').toString('base64');
      headers.Authorization = `Basic ${encoded}`;
    } else {
      form.client_id = clientId;
      form.client_secret = clientSecret;
    }

    console.log(`[Platform] Requesting ${platform} access token`);
    const token = await requestJson(this.options.tokenUrl, tokenResponseSchema, {
      platform,
      method: 'POST',
      headers,
      form,
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });

    this.accessToken = token.access_token;
    this.expiresAt = this.now() + token.expires_in * 1000 - EXPIRY_MARGIN_MS;
    return token.access_token;
  }

  /**
   * Runs a request with a valid token. When the platform rejects the token
   * (revoked before its expiry) it is dropped, so the next call requests a
   * new one.
   */
  async authorize<T>(request: (accessToken: string) => Promise<T>): Promise<T> {
    const accessToken = await this.get();
    try {
      return await request(accessToken);
    } catch (error) {
      if (error instanceof PlatformError && error.type === 'authentication') {
        this.invalidate();
      }
      throw error;
    }
  }

  /** Drops the cached token so the next call requests a new one */
  invalidate(): void {
    this.accessToken = null;
    this.expiresAt = 0;
  }
}
