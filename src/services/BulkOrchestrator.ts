/**
 * Bulk Orchestrator
 * Fans a request out over many domains through a bounded pool. Each
 * domain lists its records, plans its change set, optionally backs up,
 * and hands the plan to the reconciliation engine. Every domain gets an
 * outcome; nothing a single domain does stops the others.
 */
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type { RegistrarProvider } from '../providers/base/RegistrarProvider.js';
import { createChildLogger, symbols } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { CancelledError, ValidationError, errorMessage } from '../core/errors.js';
import { bulkRequestSchema } from '../config/schema.js';
import type {
  BatchResult,
  BatchSummary,
  BulkRequest,
  DnsRecord,
  DomainOutcome,
  DomainStatus,
  GeneratedChainRecord,
  ReconciliationPlan,
} from '../types/index.js';
import { dedupeDomains, isHostname, normalizeHostname } from '../utils/dns.js';
import { runPool } from '../utils/concurrency.js';
import { ReconciliationEngine, emptyOutcome, failureFrom } from './ReconciliationEngine.js';
import { RecordValidator } from './RecordValidator.js';
import { planSpfChain } from './SpfChainPlanner.js';
import { planTemplate } from './TemplatePlanner.js';
import type { SpfChainGeneratorOptions } from './SpfChainGenerator.js';
import type { RecordBackup } from './RecordBackup.js';

export interface BulkOrchestratorOptions {
  maxConcurrentDomains?: number;
  defaultTtl?: number;
  /** Used when an SPF request carries no final directive */
  finalDirective?: string;
  spf?: SpfChainGeneratorOptions;
  validator?: RecordValidator;
  backup?: RecordBackup;
  eventBus?: EventBus;
}

export interface RunBulkOptions {
  signal?: AbortSignal;
  batchId?: string;
}

const DEFAULT_MAX_CONCURRENT_DOMAINS = 5;
const DEFAULT_TTL = 600;

export function summarize(outcomes: DomainOutcome[]): BatchSummary {
  const summary: BatchSummary = { total: outcomes.length, success: 0, partialFailure: 0, failure: 0, cancelled: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}

/**
 * Overall status: uniform outcomes keep their status, anything mixed is a partial failure
 */
export function batchStatus(summary: BatchSummary): DomainStatus {
  if (summary.success === summary.total) return 'success';
  if (summary.failure === summary.total) return 'failure';
  if (summary.cancelled === summary.total) return 'cancelled';
  return 'partialFailure';
}

/**
 * Domains worth another run: everything that did not fully succeed
 */
export function domainsToRetry(result: BatchResult): string[] {
  return result.outcomes.filter((o) => o.status !== 'success').map((o) => o.domain);
}

export class BulkOrchestrator {
  private readonly logger: Logger;
  private readonly engine: ReconciliationEngine;
  private readonly validator: RecordValidator;
  private readonly eventBus: EventBus;
  private readonly maxConcurrentDomains: number;
  private readonly defaultTtl: number;

  constructor(
    private readonly provider: RegistrarProvider,
    private readonly options: BulkOrchestratorOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'BulkOrchestrator' });
    this.eventBus = options.eventBus ?? defaultEventBus;
    this.validator = options.validator ?? new RecordValidator();
    this.engine = new ReconciliationEngine(provider, {
      validator: this.validator,
      eventBus: this.eventBus,
    });
    this.maxConcurrentDomains = options.maxConcurrentDomains ?? DEFAULT_MAX_CONCURRENT_DOMAINS;
    this.defaultTtl = options.defaultTtl ?? DEFAULT_TTL;
  }

  /**
   * Apply `request` to every domain. Throws ValidationError for a bad
   * request before any registrar call is made.
   */
  async runBulk(domains: string[], request: BulkRequest, options: RunBulkOptions = {}): Promise<BatchResult> {
    const validated = this.validateRequest(request);
    const selected = dedupeDomains(domains);
    const batchId = options.batchId ?? uuidv4();
    const startedAt = new Date();

    this.logger.info(
      { batchId, count: selected.length, kind: validated.kind, concurrency: this.maxConcurrentDomains },
      `${symbols.bulk} Bulk run started`
    );
    this.eventBus.publish(EventTypes.BULK_RUN_STARTED, { batchId, domains: selected, kind: validated.kind });

    const outcomes = await runPool(selected, this.maxConcurrentDomains, (domain) =>
      this.runDomain(domain, validated, batchId, options.signal)
    );

    const summary = summarize(outcomes);
    const status = batchStatus(summary);
    const finishedAt = new Date();

    this.eventBus.publish(EventTypes.BULK_RUN_COMPLETED, { batchId, status, summary });
    this.logger.info(
      { batchId, status, ...summary, durationMs: finishedAt.getTime() - startedAt.getTime() },
      `${status === 'success' ? symbols.success : symbols.warning} Bulk run finished`
    );

    return { batchId, startedAt, finishedAt, status, summary, outcomes };
  }

  /**
   * Apply `request` to one domain
   */
  async reconcileDomain(domain: string, request: BulkRequest, options: RunBulkOptions = {}): Promise<DomainOutcome> {
    const validated = this.validateRequest(request);
    return this.runDomain(normalizeHostname(domain), validated, options.batchId ?? uuidv4(), options.signal);
  }

  private validateRequest(request: BulkRequest): BulkRequest {
    const result = bulkRequestSchema.safeParse(request);
    if (!result.success) {
      throw ValidationError.fromIssues(
        'bulk request',
        result.error.errors.map((issue) => ({ field: issue.path.join('.') || 'request', message: issue.message }))
      );
    }

    const parsed = result.data;
    if (parsed.kind === 'spfChain' && !(parsed.finalDirective ?? this.options.finalDirective)) {
      throw ValidationError.fromIssues('bulk request', [
        { field: 'finalDirective', message: 'No final directive given and no default configured' },
      ]);
    }
    return parsed;
  }

  /**
   * One pool task. Never throws: every error becomes this domain's outcome.
   */
  private async runDomain(
    domain: string,
    request: BulkRequest,
    batchId: string,
    signal: AbortSignal | undefined
  ): Promise<DomainOutcome> {
    if (signal?.aborted) {
      return { ...emptyOutcome(domain, 'cancelled'), errorDetail: 'Cancelled before start' };
    }

    this.eventBus.publish(EventTypes.BULK_DOMAIN_STARTED, { batchId, domain });
    let outcome: DomainOutcome;
    try {
      outcome = await this.processDomain(domain, request, signal);
    } catch (error) {
      this.logger.error({ domain, error }, 'Unexpected error while processing domain');
      outcome = {
        ...emptyOutcome(domain, 'failure'),
        failures: [failureFrom('list', error)],
        errorDetail: errorMessage(error),
      };
    }

    this.eventBus.publish(EventTypes.BULK_DOMAIN_COMPLETED, {
      batchId,
      domain,
      status: outcome.status,
      recordsDeleted: outcome.recordsDeleted,
      recordsCreated: outcome.recordsCreated,
      recordsUpdated: outcome.recordsUpdated,
    });
    return outcome;
  }

  private async processDomain(domain: string, request: BulkRequest, signal: AbortSignal | undefined): Promise<DomainOutcome> {
    if (!isHostname(domain)) {
      return this.failed(domain, failureFrom('list', new ValidationError(`Invalid domain name: ${domain}`)));
    }

    let existing: DnsRecord[];
    try {
      existing = await this.provider.listRecords(domain, { signal });
    } catch (error) {
      if (error instanceof CancelledError) {
        return { ...emptyOutcome(domain, 'cancelled'), errorDetail: error.message };
      }
      return this.failed(domain, failureFrom('list', error));
    }

    let plan: ReconciliationPlan;
    let chain: GeneratedChainRecord[] | undefined;
    try {
      ({ plan, chain } = this.plan(domain, request, existing));
    } catch (error) {
      return this.failed(domain, failureFrom('generate', error));
    }

    let backupPath: string | undefined;
    if (this.options.backup) {
      try {
        backupPath = await this.options.backup.write(domain, existing);
      } catch (error) {
        return this.failed(domain, failureFrom('backup', error));
      }
    }

    const outcome = await this.engine.reconcile(domain, plan, { signal });
    if (chain) outcome.chain = chain;
    if (backupPath) outcome.backupPath = backupPath;
    return outcome;
  }

  private plan(
    domain: string,
    request: BulkRequest,
    existing: DnsRecord[]
  ): { plan: ReconciliationPlan; chain?: GeneratedChainRecord[] } {
    if (request.kind === 'spfChain') {
      const spec = {
        domain,
        chainLength: request.chainLength,
        finalDirective: request.finalDirective ?? this.options.finalDirective ?? '',
        wildcardRedirect: request.wildcardRedirect ?? false,
        ttl: request.ttl ?? this.defaultTtl,
      };
      return planSpfChain(spec, existing, { ...this.options.spf, validator: this.validator });
    }

    // Compare against the TTL the registrar will actually store
    const desired = request.records.map((record) => ({
      ...record,
      ttl: this.provider.normalizeTtl(record.ttl ?? this.defaultTtl),
    }));
    return {
      plan: planTemplate(existing, desired, {
        replaceTypes: request.replaceTypes,
        pruneUnmatched: request.pruneUnmatched,
      }),
    };
  }

  private failed(domain: string, failure: DomainOutcome['failures'][number]): DomainOutcome {
    this.logger.warn({ domain, operation: failure.operation, code: failure.code }, failure.message);
    return { ...emptyOutcome(domain, 'failure'), failures: [failure], errorDetail: failure.message };
  }
}
