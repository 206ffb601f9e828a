import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { FetchError, isPipelineError, errorMessage } from '../../utils/errors.js';
import type { QueryParameters, RankingEntry } from '../../talents/types.js';
import { wclClient, type WarcraftLogsGraphqlClient } from './graphqlClient.js';

/** Mythic. */
export const RANKINGS_DIFFICULTY = 5;
export const RANKINGS_METRIC = 'dps';

const RANKINGS_QUERY = `
query CharacterRankings($encounterId: Int!, $className: String!, $specName: String!, $difficulty: Int!, $serverRegion: String) {
  worldData {
    encounter(id: $encounterId) {
      characterRankings(
        className: $className
        specName: $specName
        metric: ${RANKINGS_METRIC}
        difficulty: $difficulty
        page: 1
        serverRegion: $serverRegion
      )
    }
  }
}
`;

// characterRankings is a JSON scalar; shape checked separately below.
const RankingsResponseSchema = z.object({
  worldData: z
    .object({
      encounter: z.object({ characterRankings: z.unknown() }).nullable(),
    })
    .nullable(),
});

const RankingsPageSchema = z.object({
  rankings: z.array(z.unknown()),
});

const RankingItemSchema = z
  .object({
    name: z.string().optional(),
    report: z
      .object({
        code: z.string().optional(),
        fightID: z.number().int().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/**
 * Upstream expects class/spec names in concatenated form:
 * "Death_Knight" / "Death Knight" -> "DeathKnight", "Beast_Mastery" -> "BeastMastery".
 */
export function normalizeGameName(name: string): string {
  return name.replace(/[\s_-]+/g, '');
}

function toRankingEntry(raw: unknown): RankingEntry {
  const parsed = RankingItemSchema.safeParse(raw);
  if (!parsed.success) return { name: '', reportCode: '', fightId: 0 };
  return {
    name: parsed.data.name ?? '',
    reportCode: parsed.data.report?.code ?? '',
    fightId: parsed.data.report?.fightID ?? 0,
  };
}

export class RankingsFetcher {
  constructor(private readonly client: Pick<WarcraftLogsGraphqlClient, 'query'>) {}

  /**
   * First page of DPS rankings for (class, spec, encounter[, region]) in leaderboard order.
   * AuthError/ConfigError pass through; every other failure becomes FetchError.
   */
  async fetchRankings(params: QueryParameters): Promise<RankingEntry[]> {
    const variables = {
      encounterId: params.encounterId,
      className: normalizeGameName(params.className),
      specName: normalizeGameName(params.specName),
      difficulty: RANKINGS_DIFFICULTY,
      serverRegion: params.region ?? null,
    };

    let data: z.infer<typeof RankingsResponseSchema>;
    try {
      data = await this.client.query('rankings', RANKINGS_QUERY, variables, RankingsResponseSchema);
    } catch (err) {
      if (isPipelineError(err) && (err.kind === 'auth' || err.kind === 'config' || err.kind === 'fetch')) throw err;
      throw new FetchError(`Rankings query failed: ${errorMessage(err)}`, { cause: err });
    }

    const page = RankingsPageSchema.safeParse(data.worldData?.encounter?.characterRankings);
    if (!page.success) {
      throw new FetchError(`No rankings returned for encounter ${params.encounterId}`);
    }

    const entries = page.data.rankings.map(toRankingEntry);
    logger.info('rankings_fetched', {
      encounterId: params.encounterId,
      className: variables.className,
      specName: variables.specName,
      region: params.region ?? 'all',
      count: entries.length,
    });
    return entries;
  }
}

export const rankingsFetcher = new RankingsFetcher(wclClient);
