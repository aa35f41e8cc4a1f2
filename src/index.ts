/**
 * Metrics Optimizer Main Entry Point
 */

import * as dotenv from 'dotenv';
import { pathToFileURL } from 'url';
import { createLoopFromConfig, startWithMonitoring } from '../optimizer/index.js';
import { loadConfig, applyEnvOverrides } from './config.js';
import { Logger, consoleLogger } from './utils/logger.js';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
  Logger.info('Starting metrics optimizer...', { component: 'main' });

  let config = await loadConfig();
  config = applyEnvOverrides(config);

  const { loop } = createLoopFromConfig(config, consoleLogger);

  startWithMonitoring(loop, config.loop.strategy, snapshot => {
    Logger.debug('Tick recorded', { composite: snapshot.composite, taken_at: snapshot.taken_at });
  });

  const shutdown = async (signal: string): Promise<void> => {
    Logger.info(`Received ${signal}, shutting down...`, { component: 'main' });
    await loop.stop();
    Logger.info('Final analytics', { analytics: loop.getAnalytics() });
    process.exit(0);
  };

  // Handle graceful shutdown
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(error => Logger.error('shut down metrics optimizer', error));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => Logger.error('shut down metrics optimizer', error));
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    Logger.error('start metrics optimizer', error, { component: 'main' });
    process.exit(1);
  });
}
