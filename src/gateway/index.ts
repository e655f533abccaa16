import express, { Express } from 'express';
import { AuthCore, createAuthCore } from '../auth';
import { config } from '../shared/config';
import { parseTestNowHeader } from '../shared/clock';
import { logger } from '../shared/logger';
import { createErrorMiddleware } from './middleware/errors';
import { createAuthRoutes } from './routes/auth';

export function createApp(core: AuthCore): Express {
  const app = express();
  app.use(express.json());

  // Test time control middleware
  if (config.isTest) {
    app.use((req, _res, next) => {
      parseTestNowHeader(req.get('x-test-now'));
      next();
    });
  }

  // Public routes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'tenant-auth-core' });
  });

  app.use('/auth', createAuthRoutes(core.authService, core.resolver));

  app.use(createErrorMiddleware());
  return app;
}

// Initialize and start
async function start(): Promise<void> {
  const core = createAuthCore();
  await core.connect();

  const app = createApp(core);
  const port = config.gateway.port;
  app.listen(port, () => {
    logger.info({ port, storeDriver: config.store.driver }, 'Auth gateway listening');
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Failed to start auth gateway');
    process.exitCode = 1;
  });
}
