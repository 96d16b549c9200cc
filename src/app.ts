/**
 * Express application: CORS, rate limiting, request logging, routes
 */

import express, { Express } from 'express';
import rateLimit from 'express-rate-limit';
import { Services } from './container';
import { createCors } from './middleware/cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createAdminRouter } from './routes/admin';
import { createAvailabilityRouter } from './routes/availability';
import { createBookingsRouter } from './routes/bookings';
import { createHealthRouter } from './routes/health';
import { createSubjectsRouter } from './routes/subjects';
import { createTutorsRouter } from './routes/tutors';
import { logger } from './utils/logger';
import { resolveRequestId } from './utils/requestId';

export function createApp(services: Services): Express {
  const { config } = services;
  const app = express();

  app.use(createCors(config.corsOrigins, config.nodeEnv));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: config.rateLimitMax,
    message: {
      ok: false,
      error: { code: 'RATE_LIMITED', message: 'Too many requests from this IP, please try again later.' },
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use('/api', limiter);

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));

  // Request logging middleware
  app.use((req, res, next) => {
    const requestId = resolveRequestId(req.headers['x-request-id']);
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    const startTime = Date.now();

    res.on('finish', () => {
      logger.info(`${req.method} ${req.path}`, {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });

    next();
  });

  // Routes
  app.use('/health', createHealthRouter(services.db));
  app.use('/api/subjects', createSubjectsRouter(services));
  app.use('/api/availability', createAvailabilityRouter(services));
  app.use('/api/bookings', createBookingsRouter(services));
  app.use('/api/tutors', createTutorsRouter(services));
  app.use('/api/admin', createAdminRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
