/**
 * Warcraft Logs client-credentials token, cached for the lifetime of the process.
 *
 * The cell is either `empty` or `populated`. Writes are single-flight: while one
 * exchange is in flight every caller awaits the same promise, so concurrent
 * streams never race each other into redundant token requests.
 */
import { z } from 'zod';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { AuthError, ConfigError, errorMessage, truncateBody } from '../../utils/errors.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
});

export type TokenCell =
  | { state: 'empty' }
  | { state: 'populated'; token: string; obtainedAt: number; expiresAt?: number };

export type TokenCacheOptions = {
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  timeoutMs: number;
  /** Refresh this many ms before expiresAt. */
  refreshSkewMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
};

export class TokenCache {
  private cell: TokenCell = { state: 'empty' };
  private inFlight: Promise<string> | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly opts: TokenCacheOptions) {
    this.fetchImpl = opts.fetchImpl ?? ((input: string | URL | Request, init?: RequestInit) => fetch(input, init));
    this.now = opts.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    const cached = this.freshToken();
    if (cached) return cached;

    if (!this.inFlight) {
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /** Drop the cached token, e.g. after the API answered 401. */
  invalidate(): void {
    if (this.cell.state === 'populated') {
      logger.info('wcl_token_invalidated');
    }
    this.cell = { state: 'empty' };
  }

  status(): { state: TokenCell['state']; expiresInMs?: number; refreshing: boolean } {
    const refreshing = this.inFlight !== undefined;
    if (this.cell.state === 'empty') return { state: 'empty', refreshing };
    const expiresInMs = this.cell.expiresAt !== undefined ? this.cell.expiresAt - this.now() : undefined;
    return { state: 'populated', expiresInMs, refreshing };
  }

  private freshToken(): string | undefined {
    if (this.cell.state === 'empty') return undefined;
    const { token, expiresAt } = this.cell;
    if (expiresAt === undefined) return token;
    return this.now() < expiresAt - this.opts.refreshSkewMs ? token : undefined;
  }

  private async exchange(): Promise<string> {
    const { clientId, clientSecret, tokenUrl, timeoutMs } = this.opts;
    if (!clientId || !clientSecret) {
      throw new ConfigError('Warcraft Logs credentials not configured (WCL_CLIENT_ID, WCL_CLIENT_SECRET)');
    }

    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(tokenUrl, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
        signal: ac.signal,
      });
      text = await res.text();
    } catch (err) {
      throw new AuthError(`Warcraft Logs token request failed: ${errorMessage(err)}`, undefined, undefined, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      const body = truncateBody(text);
      logger.warn('wcl_token_exchange_failed', { status: res.status, body });
      throw new AuthError(`Warcraft Logs token exchange failed (${res.status}): ${body}`, res.status, body);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new AuthError('Warcraft Logs token response is not JSON', res.status, truncateBody(text), { cause: err });
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError('Warcraft Logs token response missing access_token', res.status, truncateBody(text));
    }

    const obtainedAt = this.now();
    const expiresAt = parsed.data.expires_in !== undefined ? obtainedAt + parsed.data.expires_in * 1000 : undefined;
    this.cell = { state: 'populated', token: parsed.data.access_token, obtainedAt, expiresAt };

    logger.info('wcl_token_acquired', {
      expiresInSec: parsed.data.expires_in,
      tokenLast6: parsed.data.access_token.slice(-6),
    });
    return parsed.data.access_token;
  }
}

export const tokenCache = new TokenCache({
  clientId: config.wclClientId,
  clientSecret: config.wclClientSecret,
  tokenUrl: config.wclOauthTokenUrl,
  timeoutMs: config.wclTimeoutMs,
  refreshSkewMs: config.wclTokenRefreshSkewMs,
});
