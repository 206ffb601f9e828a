import { z } from 'zod';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { AuthError, FetchError, ParseError, TransportError, errorMessage, truncateBody } from '../../utils/errors.js';
import { tokenCache } from './tokenCache.js';

/** What the GraphQL client needs from the token cache. */
export interface TokenSource {
  getToken(): Promise<string>;
  invalidate(): void;
}

export type GraphqlClientOptions = {
  endpoint: string;
  timeoutMs: number;
  tokens: TokenSource;
  fetchImpl?: typeof fetch;
};

const GraphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

/**
 * Thin client for the Warcraft Logs v2 "client" GraphQL API.
 *
 * Throws AuthError/ConfigError from the token source unchanged, TransportError on
 * network/HTTP failure, FetchError when the response carries `errors`, and
 * ParseError when `data` does not match the caller's schema.
 */
export class WarcraftLogsGraphqlClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: GraphqlClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? ((input: string | URL | Request, init?: RequestInit) => fetch(input, init));
  }

  async query<T>(
    label: string,
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const token = await this.opts.tokens.getToken();

    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    const started = Date.now();

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(this.opts.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({ query, variables }),
        signal: ac.signal,
      });
      text = await res.text();
    } catch (err) {
      const reason = ac.signal.aborted ? `timeout after ${this.opts.timeoutMs}ms` : errorMessage(err);
      throw new TransportError(`Warcraft Logs ${label} request failed: ${reason}`, undefined, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (res.status === 401) {
      // Token was revoked or expired early; next caller re-authenticates.
      this.opts.tokens.invalidate();
      throw new AuthError(`Warcraft Logs rejected the access token (${label})`, res.status, truncateBody(text));
    }
    if (!res.ok) {
      throw new TransportError(`Warcraft Logs ${label} failed (${res.status}): ${truncateBody(text)}`, res.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ParseError(`Warcraft Logs ${label} response is not JSON`, { cause: err });
    }

    const envelope = GraphqlEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ParseError(`Warcraft Logs ${label} response is not a GraphQL envelope`);
    }
    if (envelope.data.errors?.length) {
      const messages = envelope.data.errors.map(e => e.message).join('; ');
      throw new FetchError(`Warcraft Logs ${label} query error: ${messages}`);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown';
      throw new ParseError(`Warcraft Logs ${label} response missing expected fields (${where})`);
    }

    logger.info('wcl_query_ok', { label, status: res.status, elapsedMs: Date.now() - started });
    return parsed.data;
  }
}

export const wclClient = new WarcraftLogsGraphqlClient({
  endpoint: config.wclGraphqlUrl,
  timeoutMs: config.wclTimeoutMs,
  tokens: tokenCache,
});
