#!/usr/bin/env node
/**
 * Sends reminder texts for confirmed sessions starting within the reminder
 * horizon. Meant for cron; exits 1 when the run itself fails.
 */

import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { createServices } from '../container';
import { openDatabase } from '../services/database';
import { logger } from '../utils/logger';

dotenv.config();

async function run(): Promise<void> {
  const config = loadConfig();
  const db = openDatabase(config.databasePath);
  try {
    const services = createServices(config, db);
    const report = await services.reminders.sendDue(services.clock.now());
    for (const warning of report.warnings) {
      logger.warn(warning);
    }
    console.log(`${report.reminded} reminders sent`);
    if (report.failed > 0) {
      console.log(`${report.failed} reminders could not be sent and will be retried next run`);
    }
  } finally {
    db.close();
  }
}

run().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.error('Reminder run failed', error);
    process.exit(1);
  }
);
