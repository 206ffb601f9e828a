/**
 * In-process stand-in for the Warcraft Logs OAuth + GraphQL endpoints, exposed
 * as a `fetch` implementation. Used only by tests.
 */

export type FakeActor = { id: number; name: string };

export type FakeRanking = { name?: string; report?: { code?: string; fightID?: number } | null };

export type FakeResponse = { status: number; body: unknown };

export type FakeCall = {
  kind: 'token' | 'rankings' | 'actors' | 'talent_code' | 'unknown';
  variables: Record<string, unknown>;
  headers: Record<string, string>;
};

export type FakeWclOptions = {
  token?: FakeResponse;
  /** Rankings array, or a full response override (status/body). */
  rankings?: FakeRanking[] | FakeResponse;
  /** Player roster per report code. Reports not listed come back as null. */
  rosters?: Record<string, FakeActor[]>;
  /** Talent codes keyed `${reportCode}:${fightId}:${actorId}`. */
  talentCodes?: Record<string, string | null>;
  /** Report codes whose GraphQL calls answer HTTP 500. */
  failingReports?: string[];
  /** Yield a macrotask before answering, like a real network round trip. */
  yieldBeforeResponse?: boolean;
};

export const FAKE_TOKEN_URL = 'https://wcl.test/oauth/token';
export const FAKE_GRAPHQL_URL = 'https://wcl.test/api/v2/client';
export const FAKE_SITE_URL = 'https://wcl.test';

function json(status: number, body: unknown): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function isFakeResponse(v: FakeRanking[] | FakeResponse): v is FakeResponse {
  return !Array.isArray(v);
}

function headersToRecord(init: RequestInit | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

function classify(query: string): FakeCall['kind'] {
  if (query.includes('CharacterRankings')) return 'rankings';
  if (query.includes('ReportActors')) return 'actors';
  if (query.includes('TalentCode')) return 'talent_code';
  return 'unknown';
}

function readVariables(body: unknown): { query: string; variables: Record<string, unknown> } {
  if (typeof body !== 'string') return { query: '', variables: {} };
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed !== 'object' || parsed === null) return { query: '', variables: {} };
  const query = 'query' in parsed && typeof parsed.query === 'string' ? parsed.query : '';
  const variables =
    'variables' in parsed && typeof parsed.variables === 'object' && parsed.variables !== null
      ? Object.fromEntries(Object.entries(parsed.variables))
      : {};
  return { query, variables };
}

function firstFightId(variables: Record<string, unknown>): number {
  const ids = variables.fightIds;
  return Array.isArray(ids) && typeof ids[0] === 'number' ? ids[0] : 0;
}

export function createFakeWarcraftLogs(opts: FakeWclOptions = {}) {
  const calls: FakeCall[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    if (opts.yieldBeforeResponse) {
      await new Promise(resolve => setImmediate(resolve));
    }
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const headers = headersToRecord(init);

    if (url === FAKE_TOKEN_URL) {
      calls.push({ kind: 'token', variables: {}, headers });
      const t = opts.token ?? { status: 200, body: { access_token: 'test-token', token_type: 'Bearer', expires_in: 3600 } };
      return json(t.status, t.body);
    }

    const { query, variables } = readVariables(init?.body);
    const kind = classify(query);
    calls.push({ kind, variables, headers });

    const code = typeof variables.code === 'string' ? variables.code : '';
    if (code && opts.failingReports?.includes(code)) {
      return json(500, { error: 'internal' });
    }

    switch (kind) {
      case 'rankings': {
        const r = opts.rankings ?? [];
        if (isFakeResponse(r)) return json(r.status, r.body);
        return json(200, { data: { worldData: { encounter: { characterRankings: { page: 1, hasMorePages: false, rankings: r } } } } });
      }
      case 'actors': {
        const roster = opts.rosters?.[code];
        if (!roster) return json(200, { data: { reportData: { report: null } } });
        const fightId = firstFightId(variables);
        return json(200, {
          data: { reportData: { report: { fights: [{ id: fightId }], masterData: { actors: roster } } } },
        });
      }
      case 'talent_code': {
        const fightId = firstFightId(variables);
        const key = `${code}:${fightId}:${String(variables.actorId)}`;
        const talentImportCode = opts.talentCodes?.[key] ?? null;
        return json(200, { data: { reportData: { report: { fights: [{ id: fightId, talentImportCode }] } } } });
      }
      default:
        return json(400, { errors: [{ message: 'unknown query' }] });
    }
  };

  return {
    fetch: fakeFetch,
    calls,
    callsOf(kind: FakeCall['kind']): FakeCall[] {
      return calls.filter(c => c.kind === kind);
    },
  };
}
