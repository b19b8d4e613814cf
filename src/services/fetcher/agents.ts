import http from 'node:http';
import https from 'node:https';

import { config } from '../../config/index.js';

function getAgentOptions(): http.AgentOptions {
  return {
    keepAlive: true,
    keepAliveMsecs: config.pool.keepAliveMsecs,
    maxSockets: config.pool.maxSockets,
    maxTotalSockets: config.pool.maxSockets,
    maxFreeSockets: config.pool.maxFreeSockets,
  };
}

// Shared by every fetch in the process.
export const httpAgent = new http.Agent(getAgentOptions());
export const httpsAgent = new https.Agent(getAgentOptions());

export function destroyAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
}
