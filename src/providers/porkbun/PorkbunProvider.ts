/**
 * Porkbun Registrar Provider Implementation
 */
import { z } from 'zod';
import {
  RegistrarProvider,
  type CallOptions,
  type RegistrarInfo,
  type RegistrarProviderOptions,
} from '../base/RegistrarProvider.js';
import type { RegistrarTransport } from '../base/transport.js';
import { dnsRecordTypeSchema } from '../../config/schema.js';
import {
  AuthError,
  NotFoundError,
  TransientError,
  ValidationError,
  type FieldIssue,
  type RegistrarError,
} from '../../core/errors.js';
import type { DnsRecord, DnsRecordInput, Domain } from '../../types/index.js';
import { isHostname, normalizeHostname, toRelativeName } from '../../utils/dns.js';

export const PORKBUN_MIN_TTL = 600;
export const PORKBUN_MAX_TTL = 2147483647;
export const PORKBUN_DEFAULT_NAMESERVERS = [
  'curitiba.ns.porkbun.com',
  'fortaleza.ns.porkbun.com',
  'maceio.ns.porkbun.com',
  'salvador.ns.porkbun.com',
];

// listAll returns at most this many domains per page
const DOMAIN_PAGE_SIZE = 1000;
const MIN_NAMESERVERS = 2;
const MAX_NAMESERVERS = 10;

const AUTH_PATTERN = /api key|not opted in|api access|unauthori[sz]ed|authentication/i;
const NOT_FOUND_PATTERN = /not found|could not find|unable to find|invalid record id|does not exist/i;
const RATE_LIMIT_PATTERN = /rate limit|too many requests/i;

// Response schemas
const stringish = z.union([z.string(), z.number()]);

const envelopeSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

const porkbunRecordSchema = z.object({
  id: stringish.transform(String),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: stringish.optional(),
  prio: stringish.nullish(),
  notes: z.string().nullish(),
});

const retrieveResponseSchema = z.object({
  status: z.literal('SUCCESS'),
  records: z.array(porkbunRecordSchema),
});

const listAllResponseSchema = z.object({
  status: z.literal('SUCCESS'),
  domains: z
    .array(
      z.object({
        domain: z.string(),
        status: z.string().nullish(),
        expireDate: z.string().nullish(),
      })
    )
    .nullish()
    .transform((domains) => domains ?? []),
});

const getNsResponseSchema = z.object({
  status: z.literal('SUCCESS'),
  ns: z
    .array(z.string())
    .nullish()
    .transform((ns) => ns ?? []),
});

const createResponseSchema = z.object({
  status: z.literal('SUCCESS'),
  id: stringish.transform(String),
});

const successResponseSchema = z.object({
  status: z.literal('SUCCESS'),
});

type PorkbunRecord = z.infer<typeof porkbunRecordSchema>;

/**
 * Map a Porkbun failure (HTTP status plus the body's message) into the error taxonomy
 */
export function mapPorkbunError(statusCode: number, message: string, resource: string = 'Resource'): RegistrarError {
  if (statusCode === 429 || RATE_LIMIT_PATTERN.test(message)) {
    return TransientError.rateLimited(message);
  }
  if (statusCode >= 500) {
    return new TransientError(message, statusCode);
  }
  if (statusCode === 401 || statusCode === 403 || AUTH_PATTERN.test(message)) {
    return new AuthError(message, statusCode);
  }
  if (statusCode === 404 || NOT_FOUND_PATTERN.test(message)) {
    return new NotFoundError(resource, statusCode);
  }
  return new ValidationError(message, [], statusCode);
}

export interface PorkbunProviderOptions extends RegistrarProviderOptions {
  name?: string;
}

/**
 * Porkbun Registrar Provider
 */
export class PorkbunProvider extends RegistrarProvider {
  constructor(
    private readonly transport: RegistrarTransport,
    options: PorkbunProviderOptions = {}
  ) {
    super(options.name ?? 'porkbun', options);
  }

  getInfo(): RegistrarInfo {
    return {
      name: this.providerName,
      type: 'porkbun',
      features: {
        ttlMin: PORKBUN_MIN_TTL,
        ttlMax: PORKBUN_MAX_TTL,
        supportedTypes: ['A', 'AAAA', 'CNAME', 'MX', 'TXT', 'NS', 'SRV', 'TLSA', 'CAA', 'HTTPS', 'SVCB'],
        defaultNameservers: PORKBUN_DEFAULT_NAMESERVERS,
      },
    };
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.call('ping', undefined, () => this.request('/ping', successResponseSchema));
      return true;
    } catch (error) {
      this.logger.error({ error }, 'Porkbun connection test failed');
      return false;
    }
  }

  async listDomains(options: CallOptions = {}): Promise<Domain[]> {
    const domains: Domain[] = [];
    let start = 0;

    while (true) {
      const page = await this.call(
        'listDomains',
        undefined,
        () => this.request('/domain/listAll', listAllResponseSchema, { start }),
        options
      );

      for (const entry of page.domains) {
        const domain: Domain = { name: normalizeHostname(entry.domain) };
        if (entry.status) domain.status = entry.status;
        if (entry.expireDate) domain.expiresAt = entry.expireDate;
        domains.push(domain);
      }

      if (page.domains.length < DOMAIN_PAGE_SIZE) {
        break;
      }
      start += DOMAIN_PAGE_SIZE;
    }

    this.logger.debug({ count: domains.length }, 'Listed registrar domains');
    return domains;
  }

  async getNameservers(domain: string, options: CallOptions = {}): Promise<string[]> {
    const zone = normalizeHostname(domain);
    const response = await this.call(
      'getNameservers',
      zone,
      () => this.request(`/domain/getNs/${zone}`, getNsResponseSchema, {}, `Domain ${zone}`),
      options
    );
    return response.ns.map(normalizeHostname);
  }

  async updateNameservers(domain: string, nameservers: string[], options: CallOptions = {}): Promise<void> {
    const zone = normalizeHostname(domain);
    const ns = nameservers.map(normalizeHostname).filter((n) => n.length > 0);

    const issues: FieldIssue[] = [];
    if (ns.length < MIN_NAMESERVERS) {
      issues.push({ field: 'nameservers', message: `At least ${MIN_NAMESERVERS} nameservers are required` });
    }
    if (ns.length > MAX_NAMESERVERS) {
      issues.push({ field: 'nameservers', message: `At most ${MAX_NAMESERVERS} nameservers are allowed` });
    }
    ns.forEach((n, index) => {
      if (!isHostname(n)) {
        issues.push({ field: `nameservers.${index}`, message: `Invalid hostname: ${n}` });
      }
    });
    if (issues.length > 0) {
      throw ValidationError.fromIssues('nameservers', issues);
    }

    await this.call(
      'updateNameservers',
      zone,
      () => this.request(`/domain/updateNs/${zone}`, successResponseSchema, { ns }, `Domain ${zone}`),
      options
    );
    this.logger.info({ domain: zone, count: ns.length }, 'Nameservers updated');
  }

  async listRecords(domain: string, options: CallOptions = {}): Promise<DnsRecord[]> {
    const zone = normalizeHostname(domain);
    const response = await this.call(
      'listRecords',
      zone,
      () => this.request(`/dns/retrieve/${zone}`, retrieveResponseSchema, {}, `Domain ${zone}`),
      options
    );

    const records: DnsRecord[] = [];
    for (const raw of response.records) {
      const converted = this.convertFromPorkbun(zone, raw);
      if (converted) {
        records.push(converted);
      }
    }

    this.logger.debug({ domain: zone, count: records.length }, 'Retrieved DNS records');
    return records;
  }

  async createRecord(domain: string, record: DnsRecordInput, options: CallOptions = {}): Promise<DnsRecord> {
    const zone = normalizeHostname(domain);
    const body = this.convertToPorkbun(record);

    const response = await this.call(
      'createRecord',
      zone,
      () => this.request(`/dns/create/${zone}`, createResponseSchema, body),
      options
    );

    const created = this.toStoredRecord(zone, response.id, record);
    this.logger.debug({ domain: zone, name: created.name, type: created.type, id: created.id }, 'DNS record created');
    return created;
  }

  async updateRecord(domain: string, id: string, record: DnsRecordInput, options: CallOptions = {}): Promise<DnsRecord> {
    const zone = normalizeHostname(domain);
    const body = this.convertToPorkbun(record);

    await this.call(
      'updateRecord',
      zone,
      () => this.request(`/dns/edit/${zone}/${id}`, successResponseSchema, body, `Record ${id}`),
      options
    );

    const updated = this.toStoredRecord(zone, id, record);
    this.logger.debug({ domain: zone, name: updated.name, type: updated.type, id }, 'DNS record updated');
    return updated;
  }

  async deleteRecord(domain: string, id: string, options: CallOptions = {}): Promise<void> {
    const zone = normalizeHostname(domain);

    await this.call(
      'deleteRecord',
      zone,
      () => this.request(`/dns/delete/${zone}/${id}`, successResponseSchema, {}, `Record ${id}`),
      options
    );
    this.logger.debug({ domain: zone, id }, 'DNS record deleted');
  }

  /**
   * POST to the API and validate the response body
   */
  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    body: Record<string, unknown> = {},
    resource?: string
  ): Promise<z.infer<S>> {
    const response = await this.transport.submit('POST', path, body);
    const envelope = envelopeSchema.safeParse(response.body);

    if (response.status >= 400 || (envelope.success && envelope.data.status !== 'SUCCESS')) {
      const message = (envelope.success ? envelope.data.message : undefined) ?? `HTTP ${response.status}`;
      this.logger.debug({ status: response.status, path, body: response.body }, 'Porkbun API error response');
      throw mapPorkbunError(response.status, message, resource);
    }

    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new TransientError(`Unexpected response from ${path}`, response.status, parsed.error.errors);
    }
    return parsed.data;
  }

  /**
   * Convert a Porkbun record; types this tool does not manage are skipped
   */
  private convertFromPorkbun(domain: string, record: PorkbunRecord): DnsRecord | null {
    const type = dnsRecordTypeSchema.safeParse(record.type.toUpperCase());
    if (!type.success) {
      this.logger.trace({ domain, type: record.type, id: record.id }, 'Skipping unsupported record type');
      return null;
    }

    const ttl = Number(record.ttl);
    const converted: DnsRecord = {
      id: record.id,
      domain,
      name: toRelativeName(record.name, domain),
      type: type.data,
      content: record.content,
      ttl: Number.isFinite(ttl) ? ttl : PORKBUN_MIN_TTL,
    };

    if ((type.data === 'MX' || type.data === 'SRV') && record.prio !== undefined && record.prio !== null) {
      const priority = Number(record.prio);
      if (Number.isFinite(priority)) {
        converted.priority = priority;
      }
    }
    if (record.notes) {
      converted.notes = record.notes;
    }

    return converted;
  }

  private convertToPorkbun(record: DnsRecordInput): Record<string, unknown> {
    const body: Record<string, unknown> = {
      name: record.name,
      type: record.type,
      content: record.content,
      ttl: String(this.normalizeTtl(record.ttl ?? PORKBUN_MIN_TTL)),
    };
    if (record.priority !== undefined) {
      body['prio'] = String(record.priority);
    }
    if (record.notes !== undefined) {
      body['notes'] = record.notes;
    }
    return body;
  }

  private toStoredRecord(domain: string, id: string, record: DnsRecordInput): DnsRecord {
    const stored: DnsRecord = {
      id,
      domain,
      name: record.name,
      type: record.type,
      content: record.content,
      ttl: this.normalizeTtl(record.ttl ?? PORKBUN_MIN_TTL),
    };
    if (record.priority !== undefined) stored.priority = record.priority;
    if (record.notes !== undefined) stored.notes = record.notes;
    return stored;
  }
}
