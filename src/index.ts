#!/usr/bin/env node
import { AppError } from './errors/app-error.js';
import { startHttpServer } from './http/server.js';
import { logError } from './services/logger.js';

let isShuttingDown = false;

const shutdownHandlerRef: { current?: (signal: string) => Promise<void> } = {};

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);

  if (!isShuttingDown && shutdownHandlerRef.current) {
    isShuttingDown = true;
    process.stderr.write('Attempting graceful shutdown...\n');
    void shutdownHandlerRef.current('UNCAUGHT_EXCEPTION');
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

try {
  const { shutdown } = await startHttpServer();
  shutdownHandlerRef.current = shutdown;
} catch (error) {
  const startupError = error instanceof Error ? error : new Error(String(error));
  logError('Failed to start media relay', startupError);
  const label = startupError instanceof AppError ? startupError.code : 'ERROR';
  process.stderr.write(`Startup failed (${label}): ${startupError.message}\n`);
  process.exit(1);
}
