/**
 * Main server entry point
 */

import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './container';
import { openDatabase } from './services/database';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

function main(): void {
  const config = loadConfig();
  const db = openDatabase(config.databasePath);
  const services = createServices(config, db);

  const seeded = services.subjects.ensureSeeded();
  logger.info('Subject catalog loaded', { subjects: seeded });

  const app = createApp(services);
  const server = app.listen(config.port, () => {
    logger.info(`Server started on port ${config.port}`, {
      port: config.port,
      nodeEnv: config.nodeEnv,
      databasePath: config.databasePath,
      timezone: config.timezone,
      fairnessWindowDays: config.fairnessWindowDays ?? 'all',
    });

    if (!config.textbelt.apiKey) {
      logger.warn('TEXTBELT_API_KEY not set, text messages will be skipped');
    }
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  logger.error('Server failed to start', error);
  process.exit(1);
}
