/**
 * Express application
 *
 * Built from injected services so that tests can drive it with supertest
 * and in-process fakes.
 */

import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './config/swagger';
import { HealthController, HealthChecks } from './controllers/health.controller';
import { correlationMiddleware } from './middleware/correlation';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { RateLimitSettings, createTripRateLimiters } from './middleware/rate-limit';
import { createTripExecutionRouter } from './routes/trip-execution.routes';
import type { TripExecutionService } from './services/trip-execution.service';
import { asyncHandler } from './utils/async-handler';
import { stream } from './utils/logger';

export interface AppDependencies {
  tripExecutionService: TripExecutionService;
  health: HealthChecks;
  apiVersion?: string;
  allowedOrigins?: string[];
  rateLimits?: RateLimitSettings;
  /** Access logging; off in tests */
  httpLogging?: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const apiVersion = deps.apiVersion ?? 'v1';

  const healthController = new HealthController(deps.health, apiVersion);

  // Security middleware
  app.use(helmet());

  // Correlation ID middleware (must be early in chain for request tracing)
  app.use(correlationMiddleware);

  app.use(
    cors({
      origin: deps.allowedOrigins ?? ['http://localhost:3001'],
      credentials: true,
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Logging middleware (Morgan -> Winston)
  if (deps.httpLogging ?? true) {
    app.use(morgan('combined', { stream }));
  }

  // Health check endpoint (no rate limit)
  app.get('/health', asyncHandler(healthController.checkHealth.bind(healthController)));

  // API Documentation (Swagger UI)
  app.use('/api-docs', swaggerUi.serve);
  app.get('/api-docs', swaggerUi.setup(swaggerSpec, { customSiteTitle: 'Trip Execution API Documentation' }));

  app.get('/api-docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  app.use(
    `/api/${apiVersion}/trips`,
    createTripExecutionRouter(deps.tripExecutionService, createTripRateLimiters(deps.rateLimits))
  );

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
