import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import path from 'node:path';

import { getErrorMessage } from '../../utils/error-utils.js';

import { logWarn } from '../logger.js';

const SCRATCH_PREFIX = 'media-relay-';

export function createScratchPath(directory: string, suffix: string): string {
  return path.join(directory, `${SCRATCH_PREFIX}${randomUUID()}${suffix}`);
}

/**
 * Deletes a scratch file. A missing file is not an error; any other failure
 * is logged and reported through the return value.
 */
export async function removeScratchFile(filePath: string): Promise<boolean> {
  try {
    await rm(filePath, { force: true });
    return true;
  } catch (error) {
    logWarn('Failed to remove scratch file', {
      path: filePath,
      error: getErrorMessage(error),
    });
    return false;
  }
}
