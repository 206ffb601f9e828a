import type { Express } from 'express';
import { config } from '../config/index.js';
import { displayName, getReferenceData, type ReferenceData } from '../config/referenceData.js';
import { buildTalentQuerySchema } from '../domain/talentQuery.js';
import { tokenCache } from '../infra/warcraftlogs/tokenCache.js';
import { startTalentStream } from '../talents/streamCoordinator.js';
import type { QueryParameters, StreamMessage } from '../talents/types.js';
import type { BoundedChannel } from '../utils/boundedChannel.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { pipeChannelToEventStream } from './sseTransport.js';
import { renderHomePage } from './views.js';

export type RouteDeps = {
  reference: ReferenceData;
  startStream: (params: QueryParameters) => BoundedChannel<StreamMessage>;
  heartbeatMs: number;
};

export function registerRoutes(app: Express, overrides: Partial<RouteDeps> = {}): void {
  const deps: RouteDeps = {
    reference: overrides.reference ?? getReferenceData(),
    startStream: overrides.startStream ?? (params => startTalentStream(params)),
    heartbeatMs: overrides.heartbeatMs ?? config.talentsHeartbeatMs,
  };
  const talentQuerySchema = buildTalentQuerySchema(deps.reference);
  const homePage = renderHomePage(deps.reference);

  app.get('/', (_req, res) => {
    res.status(200).type('html').send(homePage);
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, ts: Date.now(), token: tokenCache.status() });
  });

  app.get('/api/options', (_req, res) => {
    const classes = Object.entries(deps.reference.classes).map(([key, c]) => ({
      key,
      name: displayName(key),
      specs: c.specs.map(s => ({ key: s, name: displayName(s) })),
    }));
    res.status(200).json({
      classes,
      encounters: deps.reference.encounters,
      regions: deps.reference.regions,
    });
  });

  app.get('/api/talents', (req, res) => {
    const parsed = talentQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_query', issues: parsed.error.issues });
    }

    const { params, format } = parsed.data;
    logger.info('talents_stream_requested', { ...params, format });

    const channel = deps.startStream(params);
    void pipeChannelToEventStream(channel, res, { format, heartbeatMs: deps.heartbeatMs }).catch(err => {
      logger.error('talents_stream_failed', { err: errorMessage(err) });
      channel.closeReceiver();
      if (!res.writableEnded) res.end();
    });
  });
}
