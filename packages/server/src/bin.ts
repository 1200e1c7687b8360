#!/usr/bin/env node
/**
 * `soulrelay` — runs the relay on the configured TCP address.
 *
 * Usage:
 *   soulrelay
 *   SOULRELAY_PORT=7000 SOULRELAY_DATA_DIR=/var/lib/soulrelay soulrelay
 */

import { LogLevel, createLogger, formatError, isSoulRelayError, parseLogLevel } from '@soulrelay/types';

import { loadConfig } from './config';
import { RelayServer } from './relay-server';

/** Maximum time (ms) to wait for connections to close before force-exiting. */
const SHUTDOWN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const { config, source } = loadConfig();
  const logger = createLogger({ level: parseLogLevel(config.logLevel) ?? LogLevel.INFO, component: 'soulrelay' });
  logger.info('configuration loaded', { source: source ?? 'defaults', dataDir: config.dataDir });

  const server = new RelayServer({ config, logger });
  await server.listen();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutting down', { signal });

    const forceExitTimer = setTimeout(() => {
      logger.error('shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await server.stop();
    } catch (error) {
      logger.error('error during shutdown', { error: String(error) });
      process.exitCode = 1;
    } finally {
      clearTimeout(forceExitTimer);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  const message = isSoulRelayError(error) ? formatError(error) : String(error);
  process.stderr.write(`[soulrelay] ${message}\n`);
  process.exitCode = 1;
});
