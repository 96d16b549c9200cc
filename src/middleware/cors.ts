import cors from 'cors';
import { logger } from '../utils/logger';

type OriginCallback = (err: Error | null, allow?: boolean) => void;

/**
 * CORS for the booking front end. Origins come from CORS_ORIGIN;
 * in development any localhost origin is accepted.
 */
export function createCors(allowedOrigins: string[], nodeEnv: string) {
  const allowAll = allowedOrigins.includes('*');

  const corsOptions: cors.CorsOptions = {
    origin: (origin: string | undefined, callback: OriginCallback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin || allowAll) {
        return callback(null, true);
      }

      if (allowedOrigins.includes(origin)) {
        return callback(null, true);
      }

      if (nodeEnv === 'development' && (origin.includes('localhost') || origin.includes('127.0.0.1'))) {
        return callback(null, true);
      }

      logger.warn('CORS blocked origin', { origin });
      callback(new Error('Not allowed by CORS'));
    },
    credentials: false,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'HEAD'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  };

  return cors(corsOptions);
}
