/**
 * Registrar Provider Factory
 * Builds the configured provider with its shared rate limiter
 */
import { logger } from '../core/Logger.js';
import type { RegistrarConfig } from '../config/schema.js';
import { RateLimiter } from './base/RateLimiter.js';
import type { RegistrarProvider } from './base/RegistrarProvider.js';
import type { RegistrarTransport } from './base/transport.js';
import { PorkbunProvider } from './porkbun/PorkbunProvider.js';
import { PorkbunTransport } from './porkbun/PorkbunTransport.js';

export interface CreateProviderOptions {
  /** Replaces the fetch transport, e.g. with an in-process fake */
  transport?: RegistrarTransport;
}

export function createRateLimiter(config: RegistrarConfig): RateLimiter {
  return new RateLimiter({ requestsPerSecond: config.requestsPerSecond, burst: config.burst });
}

export function createRegistrarProvider(config: RegistrarConfig, options: CreateProviderOptions = {}): RegistrarProvider {
  const transport =
    options.transport ??
    new PorkbunTransport(
      { apiKey: config.apiKey, secretApiKey: config.secretApiKey },
      { baseUrl: config.apiUrl, timeoutMs: config.timeoutMs }
    );

  logger.debug(
    { apiUrl: config.apiUrl, retryAttempts: config.retryAttempts, rateLimit: config.requestsPerSecond },
    'Creating Porkbun provider'
  );

  return new PorkbunProvider(transport, {
    retryAttempts: config.retryAttempts,
    backoffBaseMs: config.backoffBaseMs,
    rateLimiter: createRateLimiter(config),
  });
}
