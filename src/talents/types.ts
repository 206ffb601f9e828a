import type { PipelineErrorKind } from '../utils/errors.js';

export const TALENT_UNAVAILABLE = '[Talent data unavailable]';
export const MISSING_REPORT_DATA = '[Missing report data]';
export const ANONYMOUS_NAME = 'Anonymous';

export type QueryParameters = {
  readonly className: string;
  readonly specName: string;
  readonly encounterId: number;
  /** Absent = every region. */
  readonly region?: string;
};

export type RankingEntry = {
  name: string;
  reportCode: string;
  fightId: number;
};

export type TalentResolution = {
  actorId: number;
  talentCode: string;
};

export type TalentRecord = {
  /** 1-based position among emitted records (Anonymous entries excluded). */
  rank: number;
  name: string;
  /** Talent import code, or one of the placeholder strings above. */
  talentCode: string;
  logUrl: string;
};

export type StreamMessage =
  | { type: 'record'; record: TalentRecord }
  | { type: 'error'; error: { kind: PipelineErrorKind | 'internal'; message: string } };

export type RunState =
  | 'idle'
  | 'token_acquired'
  | 'rankings_fetched'
  | 'resolving_entry'
  | 'done'
  | 'aborted_on_auth_error'
  | 'aborted_on_fetch_error'
  | 'aborted_on_sink_closed';

export type RunOutcome = {
  state: Extract<RunState, 'done' | `aborted_${string}`>;
  emitted: number;
};
