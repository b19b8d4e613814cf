import { ConfigError } from '../errors/app-error.js';

export interface MessengerCredentials {
  apiId: number;
  apiHash: string;
  session: string;
}

type CredentialVariable = 'TG_API_ID' | 'TG_API_HASH' | 'TG_STRING_SESSION';

function readRequired(env: NodeJS.ProcessEnv, name: CredentialVariable): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`Missing env var: ${name}`);
  }
  return value;
}

/**
 * Reads the messaging client credentials. All three are required; the
 * service cannot start without them.
 */
export function loadMessengerCredentials(
  env: NodeJS.ProcessEnv = process.env
): MessengerCredentials {
  const rawApiId = readRequired(env, 'TG_API_ID');
  const apiHash = readRequired(env, 'TG_API_HASH');
  const session = readRequired(env, 'TG_STRING_SESSION');

  const apiId = Number(rawApiId);
  if (!/^\d+$/.test(rawApiId) || !Number.isSafeInteger(apiId) || apiId <= 0) {
    throw new ConfigError('TG_API_ID must be a positive integer');
  }

  return { apiId, apiHash, session };
}
