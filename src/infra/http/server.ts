import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createStores } from '../stores.js';
import { TokenService } from '../../application/auth/tokens.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();
const logger = createLogger({ name: 'kanban-api', level: config.logLevel });

if (config.usingDevSecret) {
  logger.warn(
    { nodeEnv: config.nodeEnv },
    'JWT_SECRET is not set; using the built-in development secret. Never run like this in production.'
  );
}

const stores = createStores(config.store, logger);
const tokens = new TokenService({
  secret: config.jwtSecret,
  ttlSeconds: config.tokenTtlSeconds,
});

const app = createApp({
  userStore: stores.userStore,
  boardStore: stores.boardStore,
  tokens,
  logger,
  rateLimit: config.rateLimit,
  healthCheck: () => stores.healthCheck(),
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
  logger.info({}, `API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close((err) => {
    stores
      .close()
      .then(() => process.exit(err ? 1 : 0))
      .catch((closeErr: unknown) => {
        logger.error({ err: closeErr instanceof Error ? closeErr.message : String(closeErr) }, 'Failed to close stores');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
