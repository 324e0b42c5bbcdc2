/**
 * Express application factory
 *
 * Dependencies are injected so the same app runs against PostgreSQL and
 * Telegram in production and in-process fakes under test.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { correlationMiddleware } from './middleware/correlation';
import { basicAuth, type DashboardCredentials } from './middleware/auth';
import { createQueryRateLimiter } from './middleware/rate-limit';
import { swaggerSpec } from './config/swagger';
import { createWebhookRouter } from './routes/webhook.routes';
import { createEventsRouter } from './routes/events.routes';
import { HealthController } from './controllers/health.controller';
import type { IngestionPipeline } from './services/ingestion.service';
import type { AlertDispatcher } from './services/alert-dispatcher.service';
import type { EventStore } from './repositories/event.repository';
import type { BackgroundTaskRunner } from './utils/background-tasks';
import { asyncHandler } from './utils/async-handler';
import { stream } from './utils/logger';

export const SERVICE_NAME = 'fleet-safety-alerts';

export interface AppDeps {
  pipeline: IngestionPipeline;
  dispatcher: AlertDispatcher;
  store: EventStore;
  backgroundTasks: BackgroundTaskRunner;
  signatureHeader: string;
  dashboard: DashboardCredentials & { allowedOrigins: string[]; rateLimitPerMinute: number };
  /** Morgan access log; off under test */
  accessLog?: boolean;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const healthController = new HealthController(deps.store);

  // Security middleware
  app.use(helmet());

  // Correlation ID middleware (must be early in chain for request tracing)
  app.use(correlationMiddleware);

  if (deps.accessLog ?? true) {
    app.use(morgan('combined', { stream }));
  }

  /**
   * @openapi
   * /:
   *   get:
   *     tags: [Health]
   *     summary: Liveness probe
   *     responses:
   *       200:
   *         description: Service is running
   */
  app.get('/', (req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME });
  });

  /**
   * @openapi
   * /health:
   *   get:
   *     tags: [Health]
   *     summary: Health check including database connectivity
   *     responses:
   *       200:
   *         description: Health report (status is `degraded` when the database is unreachable)
   */
  app.get('/health', asyncHandler(healthController.checkHealth.bind(healthController)));

  // API Documentation (Swagger UI)
  app.use('/api-docs', swaggerUi.serve);
  app.get(
    '/api-docs',
    swaggerUi.setup(swaggerSpec, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'Fleet Safety Alerts API',
    })
  );

  app.get('/api-docs.json', (req, res) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });

  // Raw-body route; mounted before any JSON parser
  app.use(
    '/webhook',
    createWebhookRouter({
      pipeline: deps.pipeline,
      dispatcher: deps.dispatcher,
      backgroundTasks: deps.backgroundTasks,
      signatureHeader: deps.signatureHeader,
    })
  );

  // Reporting API (basic auth, rate limited)
  app.use(
    '/api/events',
    cors({ origin: deps.dashboard.allowedOrigins.length > 0 ? deps.dashboard.allowedOrigins : false }),
    createQueryRateLimiter(deps.dashboard.rateLimitPerMinute),
    basicAuth({ username: deps.dashboard.username, password: deps.dashboard.password }),
    createEventsRouter(deps.store)
  );

  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
