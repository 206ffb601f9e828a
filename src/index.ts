import express from 'express';
import { registerRoutes } from './app/routes.js';
import { config } from './config/index.js';
import { getReferenceData } from './config/referenceData.js';
import { tokenCache } from './infra/warcraftlogs/tokenCache.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

const reference = getReferenceData();
logger.info('reference_data_loaded', {
  classes: Object.keys(reference.classes).length,
  encounters: reference.encounters.length,
  regions: reference.regions.length,
});

const app = express();
registerRoutes(app, { reference });

const host = '0.0.0.0';
const server = app.listen(config.port, host, () => {
  logger.info('server_listening', { port: config.port, address: `http://${host}:${config.port}` });
});

async function startup(): Promise<void> {
  if (!config.wclClientId || !config.wclClientSecret) {
    logger.warn('wcl_not_configured', { reason: 'WCL_CLIENT_ID or WCL_CLIENT_SECRET missing in .env' });
    return;
  }
  // Warm the token so the first stream does not pay for the exchange.
  try {
    await tokenCache.getToken();
    logger.info('wcl_ready', { token: tokenCache.status() });
  } catch (err) {
    logger.warn('wcl_not_ready', { err: errorMessage(err) });
  }
}

void startup();

function shutdown(signal: string): void {
  logger.info('shutdown_signal_received', { signal });
  server.close(() => process.exit(0));
  // Open SSE connections keep close() waiting; don't hang forever.
  setTimeout(() => process.exit(0), 5_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
