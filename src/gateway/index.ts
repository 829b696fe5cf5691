import express, { Express } from 'express';
import { AppConfig, config } from '../shared/config';
import { parseTestNowHeader } from '../shared/clock';
import { createAuthMiddleware } from './middleware/auth';
import { createCorsMiddleware } from './middleware/cors';
import { createErrorHandler } from './middleware/errors';
import { createAuthRoutes } from './routes/auth';
import { createLeaseRoutes } from './routes/leases';
import { Services, buildServices } from './services';

export function createApp(services: Services, appConfig: AppConfig = config): Express {
  const app = express();
  app.use(createCorsMiddleware(appConfig.corsAllowedOrigins));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Test time control middleware
  if (appConfig.isTest) {
    app.use((req, _res, next) => {
      parseTestNowHeader(req.header('x-test-now'));
      next();
    });
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'security-core' });
  });

  const authenticate = createAuthMiddleware(services.lifecycle);
  app.use('/auth', createAuthRoutes(services.authenticator, authenticate));
  app.use('/crm', createLeaseRoutes(services.leases, authenticate));

  app.use(createErrorHandler());
  return app;
}

async function start() {
  const services = buildServices(config);
  await services.store.connect();

  const app = createApp(services);
  const port = config.port;
  const server = app.listen(port, () => {
    console.log(`Security core listening on port ${port}`);
  });

  const shutdown = () => {
    server.close(() => {
      services.store.disconnect().catch(console.error);
    });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

if (require.main === module) {
  start().catch(console.error);
}
