/**
 * Main Application
 * Wires config, registrar provider and services together and runs bulk jobs
 */
import { logger, symbols } from './Logger.js';
import { eventBus as defaultEventBus, type EventBus } from './EventBus.js';
import { AuthError, ValidationError } from './errors.js';
import { ConfigManager, getConfig } from '../config/ConfigManager.js';
import { createRegistrarProvider } from '../providers/ProviderFactory.js';
import type { RegistrarProvider } from '../providers/base/RegistrarProvider.js';
import { BulkOrchestrator } from '../services/BulkOrchestrator.js';
import { NameserverMonitor } from '../services/NameserverMonitor.js';
import { RecordBackup } from '../services/RecordBackup.js';
import { RecordValidator } from '../services/RecordValidator.js';
import type { BatchResult, BulkRequest, SpfChainRequest } from '../types/index.js';

export interface ApplicationOptions {
  config?: ConfigManager;
  provider?: RegistrarProvider;
  eventBus?: EventBus;
}

export type SpfRunOverrides = Partial<Omit<SpfChainRequest, 'kind'>>;

export class Application {
  private readonly config: ConfigManager;
  private readonly provider: RegistrarProvider;
  private readonly orchestrator: BulkOrchestrator;
  private readonly monitor: NameserverMonitor;
  private readonly abortController = new AbortController();
  private isRunning: boolean = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config ?? getConfig();
    this.provider = options.provider ?? createRegistrarProvider(this.config.registrar);
    const eventBus = options.eventBus ?? defaultEventBus;

    const { backupDir } = this.config.app;
    this.orchestrator = new BulkOrchestrator(this.provider, {
      maxConcurrentDomains: this.config.bulk.maxConcurrentDomains,
      defaultTtl: this.config.bulk.defaultTtl,
      finalDirective: this.config.finalDirective,
      spf: {
        labelLength: this.config.spf.labelLength,
        maxAttemptsPerLabel: this.config.spf.maxAttemptsPerLabel,
      },
      validator: new RecordValidator({ txtMaxLength: this.config.bulk.txtMaxLength }),
      backup: backupDir ? new RecordBackup(backupDir) : undefined,
      eventBus,
    });

    this.monitor = new NameserverMonitor(this.provider, {
      pollInterval: this.config.app.nameserverPollInterval,
      concurrency: this.config.bulk.maxConcurrentDomains,
      eventBus,
    });
  }

  /**
   * Check the registrar accepts our credentials
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Application already running');
      return;
    }

    logger.info({ registrar: this.provider.getProviderName() }, `${symbols.startup} Starting bulk DNS manager`);

    const connected = await this.provider.testConnection();
    if (!connected) {
      throw new AuthError('Registrar rejected the API credentials');
    }

    this.isRunning = true;
    logger.info(`${symbols.registrar} Registrar connection verified`);
  }

  /**
   * Domains from the command line, or every registrar domain when `all` is set
   */
  async resolveDomains(requested: string[], all: boolean): Promise<string[]> {
    if (all) {
      const domains = await this.provider.listDomains({ signal: this.abortController.signal });
      return domains.map((d) => d.name);
    }
    if (requested.length === 0) {
      throw ValidationError.fromIssues('domain selection', [
        { field: 'domains', message: 'Name at least one domain or pass --all' },
      ]);
    }
    return requested;
  }

  /**
   * SPF chain run over `domains` using configured defaults
   */
  async runSpfChain(domains: string[], overrides: SpfRunOverrides = {}): Promise<BatchResult> {
    const request: SpfChainRequest = {
      kind: 'spfChain',
      chainLength: overrides.chainLength ?? this.config.spf.chainLength,
      finalDirective: overrides.finalDirective ?? this.config.finalDirective,
      wildcardRedirect: overrides.wildcardRedirect ?? false,
      ttl: overrides.ttl ?? this.config.bulk.defaultTtl,
    };
    return this.runBulk(domains, request);
  }

  async runBulk(domains: string[], request: BulkRequest): Promise<BatchResult> {
    return this.orchestrator.runBulk(domains, request, { signal: this.abortController.signal });
  }

  getOrchestrator(): BulkOrchestrator {
    return this.orchestrator;
  }

  getNameserverMonitor(): NameserverMonitor {
    return this.monitor;
  }

  /**
   * Setup graceful shutdown handlers: the first signal cancels the running batch
   */
  setupShutdownHandlers(): void {
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutdown signal received, cancelling remaining work');
      void this.shutdown(signal);
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  }

  async shutdown(reason: string = 'manual'): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = Promise.resolve().then(() => {
      this.abortController.abort();
      this.monitor.stopPolling();
      this.isRunning = false;
      logger.info({ reason }, 'Shutdown complete');
    });
    return this.shutdownPromise;
  }
}

/**
 * Create application instance
 */
export function createApplication(options?: ApplicationOptions): Application {
  return new Application(options);
}
