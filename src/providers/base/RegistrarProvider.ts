/**
 * Abstract Registrar Provider
 * Base class for registrar API adapters. Every remote operation goes
 * through `call`, which takes a rate-limit token and retries transient
 * failures with exponential backoff.
 */
import type { Logger } from 'pino';
import type { DnsRecord, DnsRecordInput, DnsRecordType, Domain } from '../../types/index.js';
import { createChildLogger } from '../../core/Logger.js';
import { CancelledError, toRegistrarError } from '../../core/errors.js';
import { RateLimiter } from './RateLimiter.js';
import { withRetry } from './retry.js';
import { normalizeHostname } from '../../utils/dns.js';

export type RegistrarOperation =
  | 'ping'
  | 'listDomains'
  | 'getNameservers'
  | 'updateNameservers'
  | 'listRecords'
  | 'createRecord'
  | 'updateRecord'
  | 'deleteRecord';

export interface RegistrarInfo {
  name: string;
  type: string;
  features: {
    ttlMin: number;
    ttlMax: number;
    supportedTypes: DnsRecordType[];
    defaultNameservers: string[];
  };
}

export interface RegistrarProviderOptions {
  retryAttempts?: number;
  backoffBaseMs?: number;
  /** Shared by every task using this provider; unlimited when omitted */
  rateLimiter?: RateLimiter;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Abstract Registrar Provider base class
 */
export abstract class RegistrarProvider {
  protected logger: Logger;
  protected readonly retryAttempts: number;
  protected readonly backoffBaseMs: number;
  protected readonly rateLimiter: RateLimiter;

  constructor(
    protected readonly providerName: string,
    options: RegistrarProviderOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'Registrar', provider: providerName });
    this.retryAttempts = options.retryAttempts ?? 3;
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.rateLimiter = options.rateLimiter ?? RateLimiter.unlimited();
  }

  /**
   * Get provider information
   */
  abstract getInfo(): RegistrarInfo;

  /**
   * Check that the credentials are accepted
   */
  abstract testConnection(): Promise<boolean>;

  abstract listDomains(options?: CallOptions): Promise<Domain[]>;

  abstract getNameservers(domain: string, options?: CallOptions): Promise<string[]>;

  abstract updateNameservers(domain: string, nameservers: string[], options?: CallOptions): Promise<void>;

  abstract listRecords(domain: string, options?: CallOptions): Promise<DnsRecord[]>;

  abstract createRecord(domain: string, record: DnsRecordInput, options?: CallOptions): Promise<DnsRecord>;

  abstract updateRecord(domain: string, id: string, record: DnsRecordInput, options?: CallOptions): Promise<DnsRecord>;

  /**
   * Delete a record by registrar id. Throws NotFoundError when it is already gone.
   */
  abstract deleteRecord(domain: string, id: string, options?: CallOptions): Promise<void>;

  /**
   * Run one remote operation with rate limiting, retry and error mapping
   */
  protected async call<T>(
    operation: RegistrarOperation,
    domain: string | undefined,
    fn: () => Promise<T>,
    options: CallOptions = {}
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await withRetry(
        async () => {
          await this.rateLimiter.acquire(signal);
          return fn();
        },
        {
          attempts: this.retryAttempts,
          backoffBaseMs: this.backoffBaseMs,
          signal,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(
              { domain, operation, attempt, delayMs, code: error.code },
              `Transient registrar error, retrying: ${error.message}`
            );
          },
        }
      );
    } catch (error) {
      const mapped = toRegistrarError(error);
      this.logger.debug({ domain, operation, code: mapped.code }, `Registrar call failed: ${mapped.message}`);
      throw mapped;
    }
  }

  /**
   * Clamp a TTL into the registrar's accepted range
   */
  normalizeTtl(ttl: number): number {
    const { ttlMin, ttlMax } = this.getInfo().features;
    return Math.min(Math.max(ttl, ttlMin), ttlMax);
  }

  /**
   * True when any nameserver is not one of the registrar's own
   */
  isExternalNameserverSet(nameservers: string[]): boolean {
    const defaults = new Set(this.getInfo().features.defaultNameservers.map(normalizeHostname));
    return nameservers.some((ns) => !defaults.has(normalizeHostname(ns)));
  }

  /**
   * Get the provider name
   */
  getProviderName(): string {
    return this.providerName;
  }
}
