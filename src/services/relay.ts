import { AppError, UploadError } from '../errors/app-error.js';

import type { UploadRequest } from '../schemas/inputs.js';

import { getErrorMessage } from '../utils/error-utils.js';

import {
  type Fetcher,
  type FetchResult,
  releaseFetchResult,
  suffixForKind,
} from './fetcher.js';
import { logInfo } from './logger.js';
import type { MessageId, Messenger, SendMediaInput } from './messenger.js';

export interface RelayResult {
  messageId: MessageId;
  bytes: number;
  attempts: number;
}

export class MediaRelay {
  constructor(
    private readonly fetcher: Pick<Fetcher, 'fetch'>,
    private readonly messenger: Messenger
  ) {}

  async relay(
    request: UploadRequest,
    signal?: AbortSignal
  ): Promise<RelayResult> {
    logInfo('Relaying media', {
      kind: request.kind,
      destination: request.destination,
      formatMode: request.formatMode,
      url: request.sourceUrl,
    });

    const download = await this.fetcher.fetch(
      request.sourceUrl,
      suffixForKind(request.kind),
      { signal }
    );

    try {
      const messageId = await this.upload(request, download);
      logInfo('Media relayed', {
        kind: request.kind,
        destination: request.destination,
        messageId,
        bytes: download.bytes,
        attempts: download.attempts,
      });
      return {
        messageId,
        bytes: download.bytes,
        attempts: download.attempts,
      };
    } finally {
      await releaseFetchResult(download);
    }
  }

  private async upload(
    request: UploadRequest,
    download: FetchResult
  ): Promise<MessageId> {
    const input: SendMediaInput = {
      destination: request.destination,
      localPath: download.localPath,
      caption: request.caption,
      formatMode: request.formatMode,
    };

    try {
      return request.kind === 'video'
        ? await this.messenger.sendVideo(input)
        : await this.messenger.sendPhoto(input);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new UploadError(`Upload failed: ${getErrorMessage(error)}`, error);
    }
  }
}
