import * as dotenv from 'dotenv';

dotenv.config();

function numberFromEnv(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(n) ? n : fallback;
}

export const config = {
  port: numberFromEnv(process.env.PORT, 3000),

  // Warcraft Logs API client (client-credentials grant).
  // These secrets should be stored in env/secret manager and never logged.
  wclClientId: (process.env.WCL_CLIENT_ID || '').trim(),
  wclClientSecret: (process.env.WCL_CLIENT_SECRET || '').trim(),

  wclOauthTokenUrl: process.env.WCL_OAUTH_TOKEN_URL || 'https://www.warcraftlogs.com/oauth/token',
  wclGraphqlUrl: process.env.WCL_GRAPHQL_URL || 'https://www.warcraftlogs.com/api/v2/client',
  /** Base used to build "View Log" links: <siteUrl>/reports/<code>#fight=<id> */
  wclSiteUrl: (process.env.WCL_SITE_URL || 'https://www.warcraftlogs.com').replace(/\/+$/, ''),

  // Per-request timeout for token exchange and GraphQL calls.
  wclTimeoutMs: numberFromEnv(process.env.WCL_TIMEOUT_MS, 15_000),

  /** Refresh the bearer token this long before the upstream expires_in runs out. */
  wclTokenRefreshSkewMs: numberFromEnv(process.env.WCL_TOKEN_REFRESH_SKEW_MS, 60_000),

  // --- Talent stream ---
  /** Bounded channel between the resolver loop and the SSE writer. */
  talentsChannelCapacity: Math.max(1, numberFromEnv(process.env.TALENTS_CHANNEL_CAPACITY, 10)),
  /** Hard cap on ranked records per run. */
  talentsMaxRecords: Math.min(10, Math.max(1, numberFromEnv(process.env.TALENTS_MAX_RECORDS, 10))),
  /** Idle keep-alive comment interval on open SSE connections. */
  talentsHeartbeatMs: Math.max(1_000, numberFromEnv(process.env.TALENTS_HEARTBEAT_MS, 15_000)),
};

export type AppConfig = typeof config;
