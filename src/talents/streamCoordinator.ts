import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { BoundedChannel } from '../utils/boundedChannel.js';
import { errorMessage, isPipelineError, type StageResult } from '../utils/errors.js';
import { tokenCache } from '../infra/warcraftlogs/tokenCache.js';
import { rankingsFetcher } from '../infra/warcraftlogs/rankingsFetcher.js';
import { talentResolver } from '../infra/warcraftlogs/talentResolver.js';
import {
  ANONYMOUS_NAME,
  MISSING_REPORT_DATA,
  TALENT_UNAVAILABLE,
  type QueryParameters,
  type RankingEntry,
  type RunOutcome,
  type RunState,
  type StreamMessage,
  type TalentRecord,
  type TalentResolution,
} from './types.js';

/** Producer side of the channel, as seen by the coordinator. */
export interface RecordSink {
  send(message: StreamMessage): Promise<boolean>;
  readonly isReceiverClosed: boolean;
}

export type StreamCoordinatorDeps = {
  tokens: { getToken(): Promise<string> };
  rankings: { fetchRankings(params: QueryParameters): Promise<RankingEntry[]> };
  resolver: { resolve(entry: RankingEntry): Promise<StageResult<TalentResolution>> };
  siteUrl: string;
  maxRecords: number;
};

export function buildLogUrl(siteUrl: string, reportCode: string, fightId: number): string {
  return `${siteUrl}/reports/${reportCode}#fight=${fightId}`;
}

function hasReportData(entry: RankingEntry): boolean {
  return entry.reportCode.trim() !== '' && Number.isInteger(entry.fightId) && entry.fightId > 0;
}

function errorMessageFor(err: unknown): StreamMessage {
  if (isPipelineError(err)) return { type: 'error', error: { kind: err.kind, message: err.message } };
  return { type: 'error', error: { kind: 'internal', message: errorMessage(err) } };
}

/**
 * Drives one pipeline run: token -> rankings -> sequential per-entry resolution,
 * pushing each finished record to the sink in rank order.
 *
 * Never throws for upstream failures: run-fatal errors become a single error
 * message on the sink. Closing the sink's receiver stops the run before the
 * next network call.
 */
export class StreamCoordinator {
  private state: RunState = 'idle';

  constructor(private readonly deps: StreamCoordinatorDeps) {}

  getState(): RunState {
    return this.state;
  }

  async run(params: QueryParameters, sink: RecordSink): Promise<RunOutcome> {
    this.state = 'idle';
    const started = Date.now();

    try {
      await this.deps.tokens.getToken();
    } catch (err) {
      logger.error('talents_token_failed', { err: errorMessage(err) });
      return this.abort('aborted_on_auth_error', sink, err);
    }
    this.state = 'token_acquired';

    let entries: RankingEntry[];
    try {
      entries = await this.deps.rankings.fetchRankings(params);
    } catch (err) {
      logger.error('talents_rankings_failed', { err: errorMessage(err), ...params });
      // A 401 during the rankings query is still an auth failure.
      const state = isPipelineError(err) && (err.kind === 'auth' || err.kind === 'config')
        ? 'aborted_on_auth_error'
        : 'aborted_on_fetch_error';
      return this.abort(state, sink, err);
    }
    this.state = 'rankings_fetched';

    let rank = 1;
    for (const entry of entries) {
      if (rank > this.deps.maxRecords) break;
      if (entry.name === ANONYMOUS_NAME) continue;

      if (sink.isReceiverClosed) {
        return this.finish('aborted_on_sink_closed', rank - 1, started);
      }

      this.state = 'resolving_entry';
      const record: TalentRecord = {
        rank,
        name: entry.name,
        talentCode: await this.talentCodeFor(entry, rank),
        logUrl: buildLogUrl(this.deps.siteUrl, entry.reportCode, entry.fightId),
      };

      const delivered = await sink.send({ type: 'record', record });
      if (!delivered) {
        return this.finish('aborted_on_sink_closed', rank - 1, started);
      }
      rank += 1;
    }

    return this.finish('done', rank - 1, started);
  }

  private async talentCodeFor(entry: RankingEntry, rank: number): Promise<string> {
    if (!hasReportData(entry)) {
      logger.warn('talent_missing_report_data', { rank, name: entry.name, reportCode: entry.reportCode, fightId: entry.fightId });
      return MISSING_REPORT_DATA;
    }

    const resolved = await this.deps.resolver.resolve(entry);
    if (resolved.ok) return resolved.value.talentCode;

    logger.warn('talent_resolution_failed', {
      rank,
      name: entry.name,
      reportCode: entry.reportCode,
      fightId: entry.fightId,
      kind: resolved.error.kind,
      err: resolved.error.message,
    });
    return TALENT_UNAVAILABLE;
  }

  private async abort(
    state: 'aborted_on_auth_error' | 'aborted_on_fetch_error',
    sink: RecordSink,
    err: unknown
  ): Promise<RunOutcome> {
    this.state = state;
    // The consumer may already be gone; nothing else to do in that case.
    await sink.send(errorMessageFor(err));
    return { state, emitted: 0 };
  }

  private finish(state: 'done' | 'aborted_on_sink_closed', emitted: number, started: number): RunOutcome {
    this.state = state;
    logger.info('talents_run_finished', { state, emitted, elapsedMs: Date.now() - started });
    return { state, emitted };
  }
}

export function createStreamCoordinator(): StreamCoordinator {
  return new StreamCoordinator({
    tokens: tokenCache,
    rankings: rankingsFetcher,
    resolver: talentResolver,
    siteUrl: config.wclSiteUrl,
    maxRecords: config.talentsMaxRecords,
  });
}

/**
 * Spawns the producer in the background over a fresh bounded channel and hands
 * back the channel for the transport to drain. The channel is closed when the
 * run settles, whatever the outcome.
 */
export function startTalentStream(
  params: QueryParameters,
  coordinator: StreamCoordinator = createStreamCoordinator(),
  capacity: number = config.talentsChannelCapacity
): BoundedChannel<StreamMessage> {
  const channel = new BoundedChannel<StreamMessage>(capacity);

  void coordinator
    .run(params, channel)
    .catch(async err => {
      logger.error('talents_run_crashed', { err: errorMessage(err) });
      await channel.send(errorMessageFor(err));
    })
    .finally(() => channel.close())
    .catch(err => {
      logger.error('talents_channel_close_failed', { err: errorMessage(err) });
    });

  return channel;
}
