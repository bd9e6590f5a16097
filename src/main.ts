#!/usr/bin/env node
import logger from './utils/logger';
import { EXIT_FAILURE, shutdownApplication, startApplication } from './app';
import { describeError } from './core/errors';

const exit = (code: number) => process.exit(code);

let shuttingDown = false;

const plugin = startApplication({ env: process.env, exit });

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
shutdownSignals.forEach((signal) => {
  process.on(signal, () => {
    if (shuttingDown) {
      logger.warn(`[Main] Shutdown already in progress (signal: ${signal}).`);
      return;
    }
    shuttingDown = true;
    shutdownApplication(plugin, signal, exit);
  });
});

process.on('unhandledRejection', (reason) => {
  logger.error(`[Main] Unhandled rejection: ${describeError(reason)}`);
  process.exit(EXIT_FAILURE);
});
