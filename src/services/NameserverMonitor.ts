/**
 * Nameserver Monitor
 * Polls the registrar for each domain's nameservers and publishes
 * changes on the event bus. Failures are published, never thrown.
 */
import type { Logger } from 'pino';
import type { RegistrarProvider } from '../providers/base/RegistrarProvider.js';
import { createChildLogger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { errorMessage } from '../core/errors.js';
import { runPool } from '../utils/concurrency.js';
import { dedupeDomains } from '../utils/dns.js';

export interface NameserverStatus {
  nameservers: string[];
  external: boolean;
  checkedAt: Date;
}

export interface NameserverMonitorOptions {
  pollInterval?: number;
  concurrency?: number;
  eventBus?: EventBus;
}

function sameNameservers(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false;
  const sortedB = [...b].sort();
  return [...a].sort().every((ns, i) => ns === sortedB[i]);
}

export class NameserverMonitor {
  private logger: Logger;
  private eventBus: EventBus;
  private pollInterval: number;
  private concurrency: number;
  private pollTimer: NodeJS.Timeout | null = null;
  private domains: string[] = [];
  private snapshot: Map<string, NameserverStatus> = new Map();
  private inFlight: boolean = false;

  constructor(
    private readonly provider: RegistrarProvider,
    options: NameserverMonitorOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'NameserverMonitor' });
    this.eventBus = options.eventBus ?? defaultEventBus;
    this.pollInterval = options.pollInterval ?? 300000;
    this.concurrency = options.concurrency ?? 5;
  }

  /**
   * Replace the watched domain list. Snapshot entries for dropped domains are removed.
   */
  setDomains(domains: string[]): void {
    this.domains = dedupeDomains(domains);
    const watched = new Set(this.domains);
    for (const domain of this.snapshot.keys()) {
      if (!watched.has(domain)) {
        this.snapshot.delete(domain);
      }
    }
  }

  getDomains(): string[] {
    return [...this.domains];
  }

  /**
   * Start polling
   */
  startPolling(): void {
    if (this.pollTimer) {
      this.logger.warn('Already polling');
      return;
    }

    this.logger.info({ interval: this.pollInterval, count: this.domains.length }, 'Starting nameserver polling');

    // Initial poll
    void this.poll();

    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.pollInterval);
  }

  /**
   * Stop polling
   */
  stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
      this.logger.info('Nameserver polling stopped');
    }
  }

  isPolling(): boolean {
    return this.pollTimer !== null;
  }

  /**
   * Check every watched domain once. A poll started while another is running is skipped.
   */
  async poll(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Previous nameserver poll still running, skipping');
      return;
    }

    this.inFlight = true;
    try {
      await runPool(this.getDomains(), this.concurrency, (domain) => this.check(domain));
    } finally {
      this.inFlight = false;
    }
  }

  /**
   * Latest known nameservers per domain
   */
  getSnapshot(): Map<string, NameserverStatus> {
    return new Map(this.snapshot);
  }

  private async check(domain: string): Promise<void> {
    try {
      const nameservers = await this.provider.getNameservers(domain);
      const external = this.provider.isExternalNameserverSet(nameservers);
      const previous = this.snapshot.get(domain);

      this.snapshot.set(domain, { nameservers, external, checkedAt: new Date() });

      if (!previous || previous.external !== external || !sameNameservers(previous.nameservers, nameservers)) {
        this.logger.debug({ domain, count: nameservers.length, external }, 'Nameservers changed');
        this.eventBus.publish(EventTypes.NAMESERVERS_UPDATED, { domain, nameservers, external });
      }
    } catch (error) {
      this.logger.warn({ domain, error }, 'Nameserver check failed');
      this.eventBus.publish(EventTypes.NAMESERVERS_CHECK_FAILED, { domain, error: errorMessage(error) });
    }
  }
}
