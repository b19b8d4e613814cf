import type { Server } from 'node:http';

import { config } from '../config/index.js';
import { loadMessengerCredentials } from '../config/credentials.js';

import { Fetcher } from '../services/fetcher.js';
import { logInfo } from '../services/logger.js';
import { type Messenger, TelegramMessenger } from '../services/messenger.js';
import { MediaRelay } from '../services/relay.js';

import { createApp } from './app.js';
import {
  createShutdownHandler,
  registerSignalHandlers,
} from './server-shutdown.js';

export interface RunningServer {
  server: Server;
  messenger: Messenger;
  shutdown: (signal: string) => Promise<void>;
}

async function listen(
  app: ReturnType<typeof createApp>,
  host: string,
  port: number
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(server);
    });
  });
}

export async function startHttpServer(): Promise<RunningServer> {
  const credentials = loadMessengerCredentials();
  const messenger = new TelegramMessenger(credentials);
  await messenger.init();

  const relay = new MediaRelay(new Fetcher(), messenger);
  const app = createApp({ relay, apiKey: config.security.apiKey });
  const server = await listen(app, config.server.host, config.server.port);

  logInfo('media relay listening', {
    host: config.server.host,
    port: config.server.port,
    scratchDir: config.fetcher.scratchDir,
    apiKeyRequired: Boolean(config.security.apiKey),
  });

  const shutdown = createShutdownHandler(
    server,
    messenger,
    config.server.shutdownTimeoutMs
  );
  registerSignalHandlers(shutdown);

  return { server, messenger, shutdown };
}
