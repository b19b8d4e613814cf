import { describe, expect, test } from 'vitest';

import { config } from '../../../src/config/index.js';
import { httpAgent, httpsAgent } from '../../../src/services/fetcher/agents.js';

describe('shared agents', () => {
  test.each([
    ['http', httpAgent],
    ['https', httpsAgent],
  ])('caps the %s pool at the configured socket count', (_scheme, agent) => {
    expect(agent.maxSockets).toBe(config.pool.maxSockets);
    expect(agent.maxTotalSockets).toBe(config.pool.maxSockets);
    expect(agent.maxFreeSockets).toBe(config.pool.maxFreeSockets);
  });
});
