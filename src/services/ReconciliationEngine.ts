/**
 * Reconciliation Engine
 * Executes one domain's plan against the registrar: every delete is
 * settled before the first update or create, and writes go out one at a
 * time in plan order. Failures are attributed to the record that caused
 * them; only an AuthError stops the rest of the domain.
 */
import type { Logger } from 'pino';
import type { RegistrarProvider } from '../providers/base/RegistrarProvider.js';
import { createChildLogger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { AuthError, CancelledError, NotFoundError, toRegistrarError } from '../core/errors.js';
import type {
  DnsRecord,
  DnsRecordInput,
  DomainOutcome,
  DomainStatus,
  ReconciliationPlan,
  RecordFailure,
  RecordOperation,
} from '../types/index.js';
import { RecordValidator } from './RecordValidator.js';

export interface ReconciliationEngineOptions {
  validator?: RecordValidator;
  eventBus?: EventBus;
}

export interface ReconcileOptions {
  signal?: AbortSignal;
}

type WriteStep =
  | { operation: 'update'; existing: DnsRecord; desired: DnsRecordInput }
  | { operation: 'create'; desired: DnsRecordInput; dependent: boolean };

/** Why the engine stopped early */
type Halt = 'auth' | 'cancelled' | undefined;

export function emptyOutcome(domain: string, status: DomainStatus = 'success'): DomainOutcome {
  return {
    domain,
    status,
    recordsDeleted: 0,
    recordsCreated: 0,
    recordsUpdated: 0,
    deleted: [],
    created: [],
    updated: [],
    failures: [],
  };
}

export function failureFrom(operation: RecordOperation, error: unknown, record?: DnsRecord | DnsRecordInput): RecordFailure {
  const mapped = toRegistrarError(error);
  const failure: RecordFailure = { operation, code: mapped.code, message: mapped.message };
  if (record) failure.record = record;
  return failure;
}

function describe(record: DnsRecord | DnsRecordInput): string {
  return `${record.type} ${record.name === '' ? '@' : record.name}`;
}

export class ReconciliationEngine {
  private readonly logger: Logger;
  private readonly validator: RecordValidator;
  private readonly eventBus: EventBus;

  constructor(
    private readonly provider: RegistrarProvider,
    options: ReconciliationEngineOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'Reconciler' });
    this.validator = options.validator ?? new RecordValidator();
    this.eventBus = options.eventBus ?? defaultEventBus;
  }

  async reconcile(domain: string, plan: ReconciliationPlan, options: ReconcileOptions = {}): Promise<DomainOutcome> {
    const { signal } = options;
    const outcome = emptyOutcome(domain);
    let successfulCalls = 0;
    let halt: Halt;

    const stopFor = (error: unknown): Halt => {
      if (error instanceof AuthError) return 'auth';
      if (error instanceof CancelledError) return 'cancelled';
      return undefined;
    };

    this.logger.debug(
      {
        domain,
        deletes: plan.toDelete.length,
        updates: plan.toUpdate?.length ?? 0,
        creates: plan.toCreate.length,
      },
      'Reconciling domain'
    );

    // Delete phase
    for (const record of plan.toDelete) {
      if (signal?.aborted) {
        halt = 'cancelled';
        break;
      }
      if (!record.id) {
        outcome.failures.push({ operation: 'delete', record, code: 'VALIDATION', message: 'Record has no registrar id' });
        continue;
      }

      try {
        await this.provider.deleteRecord(domain, record.id, { signal });
        this.recordDeleted(outcome, domain, record);
        successfulCalls++;
      } catch (error) {
        if (error instanceof NotFoundError) {
          // Already gone is the state we wanted
          this.logger.debug({ domain, id: record.id }, 'Record already deleted');
          this.recordDeleted(outcome, domain, record);
          successfulCalls++;
          continue;
        }
        outcome.failures.push(failureFrom('delete', error, record));
        this.logger.warn({ domain, id: record.id, error }, `Failed to delete ${describe(record)}`);
        halt = stopFor(error);
        if (halt) break;
      }
    }

    // Write phase: updates, then creates in the given order
    const firstDependent = plan.toCreate.length - (plan.dependentCreates ?? 0);
    const steps: WriteStep[] = [
      ...(plan.toUpdate ?? []).map((u): WriteStep => ({ operation: 'update', existing: u.existing, desired: u.desired })),
      ...plan.toCreate.map((desired, index): WriteStep => ({ operation: 'create', desired, dependent: index >= firstDependent })),
    ];
    let createFailed = false;

    for (const step of halt ? [] : steps) {
      if (signal?.aborted) {
        halt = 'cancelled';
        break;
      }

      if (step.operation === 'create' && step.dependent && createFailed) {
        outcome.failures.push({
          operation: 'create',
          record: step.desired,
          code: 'SKIPPED',
          message: 'Not written because a record it references failed',
        });
        this.logger.warn({ domain, operation: 'create' }, `Skipped ${describe(step.desired)}`);
        continue;
      }

      const validation = this.validator.validate(step.desired);
      if (!validation.success) {
        outcome.failures.push(failureFrom(step.operation, validation.error, step.desired));
        this.logger.warn({ domain, operation: step.operation }, validation.error.message);
        if (step.operation === 'create') createFailed = true;
        continue;
      }

      try {
        if (step.operation === 'update') {
          if (!step.existing.id) {
            outcome.failures.push({
              operation: 'update',
              record: step.desired,
              code: 'VALIDATION',
              message: 'Record has no registrar id',
            });
            continue;
          }
          const updated = await this.provider.updateRecord(domain, step.existing.id, step.desired, { signal });
          outcome.updated.push(updated);
          outcome.recordsUpdated++;
          this.publishRecordEvent(EventTypes.DNS_RECORD_UPDATED, domain, updated);
        } else {
          const created = await this.provider.createRecord(domain, step.desired, { signal });
          outcome.created.push(created);
          outcome.recordsCreated++;
          this.publishRecordEvent(EventTypes.DNS_RECORD_CREATED, domain, created);
        }
        successfulCalls++;
      } catch (error) {
        outcome.failures.push(failureFrom(step.operation, error, step.desired));
        this.logger.warn({ domain, operation: step.operation, error }, `Failed to ${step.operation} ${describe(step.desired)}`);
        if (step.operation === 'create') createFailed = true;
        halt = stopFor(error);
        if (halt) break;
      }
    }

    outcome.status = this.resolveStatus(outcome, successfulCalls, halt);
    if (outcome.status !== 'success') {
      outcome.errorDetail = this.errorDetail(outcome, halt);
    }

    this.logger.info(
      {
        domain,
        status: outcome.status,
        deleted: outcome.recordsDeleted,
        updated: outcome.recordsUpdated,
        created: outcome.recordsCreated,
      },
      'Domain reconciled'
    );
    return outcome;
  }

  private resolveStatus(outcome: DomainOutcome, successfulCalls: number, halt: Halt): DomainStatus {
    if (halt === 'cancelled') return 'cancelled';
    if (outcome.failures.length === 0) return 'success';
    return successfulCalls > 0 ? 'partialFailure' : 'failure';
  }

  private errorDetail(outcome: DomainOutcome, halt: Halt): string {
    const messages = outcome.failures.map((f) => (f.record ? `${describe(f.record)}: ${f.message}` : f.message));
    if (halt === 'cancelled') {
      messages.push('Cancelled before all changes were applied');
    } else if (halt === 'auth') {
      messages.push('Remaining changes skipped after an authentication failure');
    }
    return messages.join('; ');
  }

  private recordDeleted(outcome: DomainOutcome, domain: string, record: DnsRecord): void {
    outcome.deleted.push(record);
    outcome.recordsDeleted++;
    this.publishRecordEvent(EventTypes.DNS_RECORD_DELETED, domain, record);
  }

  private publishRecordEvent(
    eventType: typeof EventTypes.DNS_RECORD_CREATED | typeof EventTypes.DNS_RECORD_UPDATED | typeof EventTypes.DNS_RECORD_DELETED,
    domain: string,
    record: DnsRecord
  ): void {
    const payload = { domain, record: { name: record.name, type: record.type, content: record.content } };
    this.eventBus.publish(eventType, record.id ? { ...payload, record: { ...payload.record, id: record.id } } : payload);
  }
}
