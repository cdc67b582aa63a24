export * from './RegistrarProvider.js';
export * from './RateLimiter.js';
export * from './retry.js';
export type * from './transport.js';
