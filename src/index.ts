#!/usr/bin/env node
/**
 * Main entry point for the resource watchdog
 */

import dotenv from 'dotenv';
import { WatchdogApp } from './app';
import { loadEnvironment } from './config/environment';
import { Logger } from './utils/logger';
import { VERSION } from './version';

dotenv.config();

const logger = new Logger('Main');
let app: WatchdogApp | null = null;

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    if (app) {
      await app.stop();
      app = null;
    }

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  logger.info(`Starting resource watchdog v${VERSION}...`);
  logger.info(`Node version: ${process.version}`);
  logger.info(`Platform: ${process.platform}`);

  try {
    const env = loadEnvironment();
    app = new WatchdogApp({ env });
    await app.initialize();
    await app.start();
  } catch (error) {
    logger.error('Failed to start resource watchdog:', error);
    process.exit(1);
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('uncaughtException', error => {
    logger.error('Uncaught exception:', error);
    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled promise rejection:', reason);
    void gracefulShutdown('unhandledRejection');
  });

  logger.info('Resource watchdog started successfully');
  logger.info('Press Ctrl+C to stop');
}

main().catch(error => {
  logger.error('Unhandled error in main:', error);
  process.exit(1);
});
