import bigInt from 'big-integer';
import { sessions, TelegramClient } from 'telegram';

import type { MessengerCredentials } from '../config/credentials.js';

import { ConfigError, UploadError } from '../errors/app-error.js';

import { getErrorMessage } from '../utils/error-utils.js';

import { logDebug, logInfo } from './logger.js';

export type FormatMode = 'html' | 'markdown' | 'none';

export interface SendMediaInput {
  destination: string;
  localPath: string;
  caption?: string;
  formatMode: FormatMode;
}

export type MessageId = number;

/**
 * Process-scoped messaging client. `init()` runs once at startup and
 * `shutdown()` once at exit; the same handle serves every request.
 */
export interface Messenger {
  init(): Promise<void>;
  shutdown(): Promise<void>;
  sendVideo(input: SendMediaInput): Promise<MessageId>;
  sendPhoto(input: SendMediaInput): Promise<MessageId>;
}

type PeerRef = string | bigInt.BigInteger;

const NUMERIC_PEER_PATTERN = /^-?\d+$/;

/** Numeric chat ids become big integers; usernames and links pass through. */
export function toPeerRef(destination: string): PeerRef {
  const trimmed = destination.trim();
  return NUMERIC_PEER_PATTERN.test(trimmed) ? bigInt(trimmed) : trimmed;
}

/** GramJS parse-mode value for a format mode; `false` sends plain text. */
export function toClientParseMode(mode: FormatMode): 'html' | 'md' | false {
  switch (mode) {
    case 'html':
      return 'html';
    case 'markdown':
      return 'md';
    case 'none':
      return false;
  }
}

export class TelegramMessenger implements Messenger {
  private readonly client: TelegramClient;
  private started = false;

  constructor(credentials: MessengerCredentials) {
    this.client = new TelegramClient(
      new sessions.StringSession(credentials.session),
      credentials.apiId,
      credentials.apiHash,
      { connectionRetries: 5 }
    );
  }

  async init(): Promise<void> {
    if (this.started) return;

    await this.client.connect();
    const authorized = await this.client.checkAuthorization();
    if (!authorized) {
      await this.client.disconnect();
      throw new ConfigError('TG_STRING_SESSION is not authorized');
    }

    this.started = true;
    logInfo('Messaging client connected');
  }

  async shutdown(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await this.client.destroy();
    logInfo('Messaging client disconnected');
  }

  async sendVideo(input: SendMediaInput): Promise<MessageId> {
    return this.send('video', input);
  }

  async sendPhoto(input: SendMediaInput): Promise<MessageId> {
    return this.send('photo', input);
  }

  private async send(
    kind: 'video' | 'photo',
    input: SendMediaInput
  ): Promise<MessageId> {
    if (!this.started) {
      throw new UploadError('Messaging client is not started');
    }

    logDebug('Uploading media', {
      kind,
      destination: input.destination,
      formatMode: input.formatMode,
    });

    try {
      const message = await this.client.sendFile(toPeerRef(input.destination), {
        file: input.localPath,
        caption: input.caption,
        parseMode: toClientParseMode(input.formatMode),
        forceDocument: false,
        ...(kind === 'video' && { supportsStreaming: true }),
      });
      return message.id;
    } catch (error) {
      throw new UploadError(`Upload failed: ${getErrorMessage(error)}`, error);
    }
  }
}
