import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../utils/boundedChannel.js';
import { buildFakePipeline } from '../testing/pipeline.js';
import type { FakeActor, FakeRanking, FakeWclOptions } from '../testing/fakeWarcraftLogs.js';
import { buildLogUrl, startTalentStream } from './streamCoordinator.js';
import { MISSING_REPORT_DATA, TALENT_UNAVAILABLE, type StreamMessage, type TalentRecord } from './types.js';

const params = { className: 'Mage', specName: 'Fire', encounterId: 3129 };

/** Player i plays in report R<i>, fight i, as actor 100+i with talent code CODE-<i>. */
function leaderboard(names: string[]): Pick<FakeWclOptions, 'rankings' | 'rosters' | 'talentCodes'> {
  const rankings: FakeRanking[] = [];
  const rosters: Record<string, FakeActor[]> = {};
  const talentCodes: Record<string, string> = {};
  names.forEach((name, idx) => {
    const i = idx + 1;
    rankings.push({ name, report: { code: `R${i}`, fightID: i } });
    rosters[`R${i}`] = [{ id: 100 + i, name }];
    talentCodes[`R${i}:${i}:${100 + i}`] = `CODE-${i}`;
  });
  return { rankings, rosters, talentCodes };
}

async function drain(channel: BoundedChannel<StreamMessage>): Promise<StreamMessage[]> {
  channel.close();
  const out: StreamMessage[] = [];
  for await (const msg of channel) out.push(msg);
  return out;
}

function records(messages: StreamMessage[]): TalentRecord[] {
  return messages.flatMap(m => (m.type === 'record' ? [m.record] : []));
}

describe('StreamCoordinator', () => {
  it('skips Anonymous entries without consuming a rank and stops at 10 records', async () => {
    const names = Array.from({ length: 12 }, (_, i) => (i === 2 || i === 6 ? 'Anonymous' : `Player${i + 1}`));
    const { coordinator, fake } = buildFakePipeline(leaderboard(names));
    const channel = new BoundedChannel<StreamMessage>(10);

    const outcome = await coordinator.run(params, channel);
    const got = records(await drain(channel));

    expect(outcome).toEqual({ state: 'done', emitted: 10 });
    expect(got.map(r => r.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(got.map(r => r.name)).toEqual([
      'Player1',
      'Player2',
      'Player4',
      'Player5',
      'Player6',
      'Player8',
      'Player9',
      'Player10',
      'Player11',
      'Player12',
    ]);
    expect(got[2]).toEqual({
      rank: 3,
      name: 'Player4',
      talentCode: 'CODE-4',
      logUrl: 'https://wcl.test/reports/R4#fight=4',
    });
    expect(fake.callsOf('actors').map(c => c.variables.code)).not.toContain('R3');
  });

  it('never resolves entries past the tenth record', async () => {
    const names = Array.from({ length: 14 }, (_, i) => `Player${i + 1}`);
    const { coordinator, fake } = buildFakePipeline(leaderboard(names));
    const channel = new BoundedChannel<StreamMessage>(10);

    await coordinator.run(params, channel);

    expect(records(await drain(channel))).toHaveLength(10);
    expect(fake.callsOf('actors')).toHaveLength(10);
    expect(fake.callsOf('talent_code')).toHaveLength(10);
  });

  it('substitutes placeholders for failed or missing entries and keeps going', async () => {
    const board = leaderboard(['Alpha', 'Bravo', 'Charlie', 'Delta']);
    // Bravo is missing from the R2 roster; Charlie's ranking carries no report.
    board.rosters = { ...board.rosters, R2: [{ id: 102, name: 'Someone Else' }] };
    const rankings = Array.isArray(board.rankings) ? [...board.rankings] : [];
    rankings[2] = { name: 'Charlie', report: { code: '', fightID: 0 } };
    const { coordinator, fake } = buildFakePipeline({ ...board, rankings });
    const channel = new BoundedChannel<StreamMessage>(10);

    await coordinator.run(params, channel);
    const got = records(await drain(channel));

    expect(got.map(r => [r.rank, r.name, r.talentCode])).toEqual([
      [1, 'Alpha', 'CODE-1'],
      [2, 'Bravo', TALENT_UNAVAILABLE],
      [3, 'Charlie', MISSING_REPORT_DATA],
      [4, 'Delta', 'CODE-4'],
    ]);
    expect(got[2]?.logUrl).toBe('https://wcl.test/reports/#fight=0');
    expect(fake.callsOf('actors').map(c => c.variables.code)).toEqual(['R1', 'R2', 'R4']);
  });

  it('keeps going after a transport failure on one entry', async () => {
    const { coordinator } = buildFakePipeline({ ...leaderboard(['Alpha', 'Bravo']), failingReports: ['R1'] });
    const channel = new BoundedChannel<StreamMessage>(10);

    await coordinator.run(params, channel);

    expect(records(await drain(channel)).map(r => r.talentCode)).toEqual([TALENT_UNAVAILABLE, 'CODE-2']);
  });

  it('emits one error message and no records when the rankings query fails', async () => {
    const { coordinator } = buildFakePipeline({
      rankings: { status: 200, body: { errors: [{ message: 'Invalid spec' }] } },
    });
    const channel = new BoundedChannel<StreamMessage>(10);

    const outcome = await coordinator.run(params, channel);

    expect(outcome).toEqual({ state: 'aborted_on_fetch_error', emitted: 0 });
    expect(coordinator.getState()).toBe('aborted_on_fetch_error');
    expect(await drain(channel)).toEqual([
      { type: 'error', error: { kind: 'fetch', message: 'Warcraft Logs rankings query error: Invalid spec' } },
    ]);
  });

  it('aborts before the rankings query when the token cannot be obtained', async () => {
    const { coordinator, fake } = buildFakePipeline({ token: { status: 401, body: 'bad credentials' } });
    const channel = new BoundedChannel<StreamMessage>(10);

    const outcome = await coordinator.run(params, channel);

    expect(outcome).toEqual({ state: 'aborted_on_auth_error', emitted: 0 });
    expect(fake.callsOf('rankings')).toHaveLength(0);
    expect(await drain(channel)).toEqual([
      { type: 'error', error: { kind: 'auth', message: 'Warcraft Logs token exchange failed (401): bad credentials' } },
    ]);
  });

  it('reuses the cached token across runs', async () => {
    const { coordinator, fake } = buildFakePipeline(leaderboard(['Alpha']));
    await coordinator.run(params, new BoundedChannel<StreamMessage>(10));
    await coordinator.run(params, new BoundedChannel<StreamMessage>(10));
    expect(fake.callsOf('token')).toHaveLength(1);
  });

  it('stops within one resolution step once the consumer leaves', async () => {
    const names = Array.from({ length: 8 }, (_, i) => `Player${i + 1}`);
    const { coordinator, fake } = buildFakePipeline({ ...leaderboard(names), yieldBeforeResponse: true });
    const channel = new BoundedChannel<StreamMessage>(10);

    const running = coordinator.run(params, channel);
    const seen: StreamMessage[] = [];
    for await (const msg of channel) {
      seen.push(msg);
      if (seen.length === 2) break;
    }
    const outcome = await running;

    expect(outcome).toEqual({ state: 'aborted_on_sink_closed', emitted: 2 });
    const resolvedReports = fake.calls
      .filter(c => c.kind === 'actors' || c.kind === 'talent_code')
      .map(c => c.variables.code);
    // Record 3 may have been in flight when the consumer left; record 4 must never start.
    expect(resolvedReports).not.toContain('R4');
    expect(resolvedReports.slice(0, 4)).toEqual(['R1', 'R1', 'R2', 'R2']);
  });

  it('stops without network calls when the receiver is already closed', async () => {
    const { coordinator, fake } = buildFakePipeline(leaderboard(['Alpha', 'Bravo']));
    const channel = new BoundedChannel<StreamMessage>(10);
    channel.closeReceiver();

    const outcome = await coordinator.run(params, channel);

    expect(outcome).toEqual({ state: 'aborted_on_sink_closed', emitted: 0 });
    expect(fake.callsOf('actors')).toHaveLength(0);
  });
});

describe('startTalentStream', () => {
  it('runs in the background and closes the channel when the run ends', async () => {
    const { coordinator } = buildFakePipeline(leaderboard(['Alpha', 'Anonymous', 'Bravo']));
    const channel = startTalentStream(params, coordinator, 1);

    const got: StreamMessage[] = [];
    for await (const msg of channel) got.push(msg);

    expect(records(got).map(r => `${r.rank}:${r.name}`)).toEqual(['1:Alpha', '2:Bravo']);
    expect(channel.isClosed).toBe(true);
  });
});

describe('buildLogUrl', () => {
  it('points at the fight inside the report', () => {
    expect(buildLogUrl('https://www.warcraftlogs.com', 'aBcD1234', 17)).toBe('https://www.warcraftlogs.com/reports/aBcD1234#fight=17');
  });
});
