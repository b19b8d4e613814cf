import type { Server } from 'node:http';

import { destroyAgents } from '../services/fetcher/agents.js';
import { logError, logInfo, logWarn } from '../services/logger.js';
import type { Messenger } from '../services/messenger.js';

import { getErrorMessage } from '../utils/error-utils.js';

export function createShutdownHandler(
  server: Server,
  messenger: Messenger,
  timeoutMs: number
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`${signal} received, shutting down gracefully...`);

    const forceExit = setTimeout(() => {
      logError('Forced shutdown after timeout');
      process.exit(1);
    }, timeoutMs);
    forceExit.unref();

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logWarn('HTTP server close reported an error', {
            error: error.message,
          });
        } else {
          logInfo('HTTP server closed');
        }
        resolve();
      });
      server.closeIdleConnections();
    });

    try {
      await messenger.shutdown();
    } catch (error) {
      logWarn('Failed to stop messaging client during shutdown', {
        error: getErrorMessage(error),
      });
    }

    clearTimeout(forceExit);
    destroyAgents();
    process.exit(0);
  };
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
