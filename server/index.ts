import 'dotenv/config';
import { createSessionFactory } from './browser/sessionPool';
import { loadConfig } from './config/config';
import { createApp } from './http/app';
import { createLogger } from './obs/logger';
import { createFsArtifactStore } from './persistence/fsStore';
import { createRestSink } from './storage/restSink';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  engine: config.browser.engine,
  mode: config.enrichment.mode,
  categories: config.feeds.categories.length,
  storage: {
    enabled: config.storage.enabled,
    hasUrl: Boolean(config.storage.url),
    hasApiKey: Boolean(config.storage.apiKey),
  },
});

const sessions = createSessionFactory(config, logger);
const app = createApp({
  config,
  logger,
  store: createFsArtifactStore(config),
  sessions,
  sink: createRestSink(config, logger),
});

const port = config.server.port;

const server = app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});

process.once('SIGTERM', () => {
  logger.info('Shutting down');
  server.close();
  sessions.shutdown().catch((error: unknown) => {
    logger.error('Browser shutdown failed', { error: error instanceof Error ? error.message : String(error) });
  });
});
