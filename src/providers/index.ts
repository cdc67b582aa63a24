/**
 * Providers module exports
 */
export {
  RegistrarProvider,
  RateLimiter,
  withRetry,
  backoffDelay,
  sleep,
  type RegistrarInfo,
  type RegistrarOperation,
  type RegistrarProviderOptions,
  type CallOptions,
  type RateLimiterOptions,
  type RetryOptions,
  type HttpMethod,
  type RegistrarTransport,
  type TransportResponse,
} from './base/index.js';
export {
  PorkbunProvider,
  PorkbunTransport,
  mapPorkbunError,
  PORKBUN_API_URL,
  PORKBUN_DEFAULT_NAMESERVERS,
  PORKBUN_MIN_TTL,
  type PorkbunCredentials,
  type PorkbunProviderOptions,
} from './porkbun/index.js';
export { createRegistrarProvider, createRateLimiter, type CreateProviderOptions } from './ProviderFactory.js';
