import { z } from 'zod';
import { AuthError, describeError } from './errors.js';
import { logger } from './logger.js';
import type { AccessToken } from './types.js';

const REFRESH_MARGIN_MS = 5 * 60 * 1000;
const DEFAULT_EXPIRES_IN = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
});

export type TokenManagerOptions = {
  clientId: string;
  clientSecret: string;
  authUrl: string;
  timeoutMs?: number;
  now?: () => number;
};

/**
 * Client-credentials bearer token, cached until 5 minutes before expiry.
 * Concurrent callers during a refresh share one exchange.
 */
export class TokenManager {
  private token: AccessToken | null = null;
  private inflight: Promise<AccessToken> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: TokenManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<AccessToken> {
    if (this.token && this.now() < this.token.expiresAt - REFRESH_MARGIN_MS) {
      logger.debug('Using cached OAuth token');
      return this.token;
    }
    if (!this.inflight) {
      this.inflight = this.exchange().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async exchange(): Promise<AccessToken> {
    logger.debug('Requesting new OAuth token');
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    let resp: Response;
    try {
      resp = await fetch(this.options.authUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30000),
      });
    } catch (e) {
      throw new AuthError(`Token request failed: ${describeError(e)}`, { cause: e });
    }
    if (!resp.ok) {
      throw new AuthError(`Token request failed with HTTP ${resp.status}`);
    }

    let json: unknown;
    try {
      json = await resp.json();
    } catch (e) {
      throw new AuthError('Token response is not valid JSON', { cause: e });
    }
    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError('Token response is missing access_token');
    }

    const expiresIn = parsed.data.expires_in ?? DEFAULT_EXPIRES_IN;
    this.token = { value: parsed.data.access_token, expiresAt: this.now() + expiresIn * 1000 };
    logger.debug(`OAuth token obtained, expires in ${expiresIn}s`);
    return this.token;
  }
}
