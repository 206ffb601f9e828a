import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import {
  NotFoundError,
  TransportError,
  errorMessage,
  fail,
  isPipelineError,
  ok,
  type PipelineError,
  type StageResult,
} from '../../utils/errors.js';
import type { RankingEntry, TalentResolution } from '../../talents/types.js';
import { wclClient, type WarcraftLogsGraphqlClient } from './graphqlClient.js';

const ACTORS_QUERY = `
query ReportActors($code: String!, $fightIds: [Int]!) {
  reportData {
    report(code: $code) {
      fights(fightIDs: $fightIds) { id }
      masterData {
        actors(type: "Player") { id name }
      }
    }
  }
}
`;

const TALENT_CODE_QUERY = `
query TalentCode($code: String!, $fightIds: [Int]!, $actorId: Int!) {
  reportData {
    report(code: $code) {
      fights(fightIDs: $fightIds) {
        id
        talentImportCode(actorID: $actorId)
      }
    }
  }
}
`;

const ActorsResponseSchema = z.object({
  reportData: z.object({
    report: z
      .object({
        fights: z.array(z.object({ id: z.number().int() })).nullable(),
        masterData: z
          .object({
            actors: z.array(z.object({ id: z.number().int(), name: z.string() })).nullable(),
          })
          .nullable(),
      })
      .nullable(),
  }),
});

const TalentCodeResponseSchema = z.object({
  reportData: z.object({
    report: z
      .object({
        fights: z
          .array(z.object({ id: z.number().int(), talentImportCode: z.string().nullish() }))
          .nullable(),
      })
      .nullable(),
  }),
});

type ResolveTarget = Pick<RankingEntry, 'name' | 'reportCode' | 'fightId'>;

function asPipelineError(err: unknown): PipelineError {
  if (isPipelineError(err)) return err;
  return new TransportError(errorMessage(err), undefined, { cause: err });
}

/**
 * Two dependent lookups per leaderboard entry: actor id by name within the
 * report, then the talent import code for that actor in that fight.
 * Each stage returns a tagged result; nothing here throws.
 */
export class TalentResolver {
  constructor(private readonly client: Pick<WarcraftLogsGraphqlClient, 'query'>) {}

  async resolve(entry: ResolveTarget): Promise<StageResult<TalentResolution>> {
    const actor = await this.resolveActor(entry);
    if (!actor.ok) return actor;

    const code = await this.fetchTalentCode(entry, actor.value);
    if (!code.ok) return code;

    return ok({ actorId: actor.value, talentCode: code.value });
  }

  /** Stage 1: first Player actor in roster order whose name matches exactly. */
  async resolveActor(entry: ResolveTarget): Promise<StageResult<number>> {
    let data: z.infer<typeof ActorsResponseSchema>;
    try {
      data = await this.client.query(
        'actors',
        ACTORS_QUERY,
        { code: entry.reportCode, fightIds: [entry.fightId] },
        ActorsResponseSchema
      );
    } catch (err) {
      return fail(asPipelineError(err));
    }

    const report = data.reportData.report;
    if (!report) {
      return fail(new NotFoundError(`Report ${entry.reportCode} not found`));
    }
    if (!report.fights?.some(f => f.id === entry.fightId)) {
      return fail(new NotFoundError(`Fight ${entry.fightId} not found in report ${entry.reportCode}`));
    }

    const matches = (report.masterData?.actors ?? []).filter(a => a.name === entry.name);
    const first = matches[0];
    if (!first) {
      return fail(new NotFoundError(`Player ${entry.name} not found in report ${entry.reportCode}`));
    }
    if (matches.length > 1) {
      // Same display name twice in one roster (e.g. cross-realm); we cannot tell them apart by name.
      logger.warn('actor_name_ambiguous', {
        reportCode: entry.reportCode,
        name: entry.name,
        actorIds: matches.map(a => a.id),
        chosen: first.id,
      });
    }
    return ok(first.id);
  }

  /** Stage 2: requires the actor id from stage 1. */
  async fetchTalentCode(entry: ResolveTarget, actorId: number): Promise<StageResult<string>> {
    let data: z.infer<typeof TalentCodeResponseSchema>;
    try {
      data = await this.client.query(
        'talent_code',
        TALENT_CODE_QUERY,
        { code: entry.reportCode, fightIds: [entry.fightId], actorId },
        TalentCodeResponseSchema
      );
    } catch (err) {
      return fail(asPipelineError(err));
    }

    const fight = data.reportData.report?.fights?.find(f => f.id === entry.fightId);
    const code = fight?.talentImportCode?.trim();
    if (!code) {
      return fail(new NotFoundError(`No talent code for actor ${actorId} in ${entry.reportCode}#${entry.fightId}`));
    }
    return ok(code);
  }
}

export const talentResolver = new TalentResolver(wclClient);
