import os from 'node:os';

import { Agent } from 'undici';

import { TIMEOUT } from '../../config/constants.js';

export interface AgentOptions {
  /** Upper bound on establishing a TCP/TLS connection */
  connectTimeoutMs: number;
}

function getAgentOptions(
  options: AgentOptions
): ConstructorParameters<typeof Agent>[0] {
  const cpuCount = os.availableParallelism();
  return {
    keepAliveTimeout: 60000,
    connections: Math.max(cpuCount * 2, 10),
    pipelining: 1,
    connect: { timeout: options.connectTimeoutMs },
  };
}

/**
 * Connect timeout for a given request timeout: at most half of it, so a slow
 * connect fails as a retryable connect error before the request aborts.
 */
export function resolveConnectTimeout(requestTimeoutMs: number): number {
  return Math.max(
    1,
    Math.min(TIMEOUT.MAX_CONNECT_TIMEOUT_MS, Math.floor(requestTimeoutMs / 2))
  );
}

/** One pooled agent serves both http: and https: origins. */
export function createAgent(options: AgentOptions): Agent {
  return new Agent(getAgentOptions(options));
}
