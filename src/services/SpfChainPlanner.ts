/**
 * SPF chain planning: find the records a new chain replaces, then
 * generate the chain around the names that stay.
 */
import type { DnsRecord, DnsRecordInput, GeneratedChainRecord, ReconciliationPlan, SpfChainSpec } from '../types/index.js';
import { ValidationError, type FieldIssue } from '../core/errors.js';
import { normalizeHostname, toRelativeName, unquoteTxt } from '../utils/dns.js';
import type { RecordValidator } from './RecordValidator.js';
import {
  generateSpfChain,
  validateChainSpec,
  SINGLE_LINK_NAME,
  type SpfChainGeneratorOptions,
} from './SpfChainGenerator.js';

export interface SpfChainPlanOptions extends SpfChainGeneratorOptions {
  /** Checked against every record of the new chain before the plan is returned */
  validator?: RecordValidator;
}

export interface SpfChainPlan {
  plan: ReconciliationPlan;
  chain: GeneratedChainRecord[];
}

const SPF_TARGET_PATTERN = /(?:include:|redirect=)([^\s]+)/gi;

export function isSpfRecord(record: DnsRecord): boolean {
  return record.type === 'TXT' && unquoteTxt(record.content).toLowerCase().startsWith('v=spf1');
}

/**
 * Names inside `domain` that an SPF body points at via include: or redirect=
 */
export function spfTargetsWithin(content: string, domain: string): string[] {
  const zone = normalizeHostname(domain);
  const targets: string[] = [];

  for (const match of unquoteTxt(content).matchAll(SPF_TARGET_PATTERN)) {
    const target = normalizeHostname(match[1] ?? '');
    if (target === zone || target.endsWith(`.${zone}`)) {
      targets.push(toRelativeName(target, zone));
    }
  }
  return targets;
}

/**
 * Names a chain for `spec` always writes, whatever labels are drawn
 */
export function fixedChainNames(spec: SpfChainSpec): Set<string> {
  const names = new Set<string>(['']);
  if (spec.wildcardRedirect) names.add('*');
  if (spec.chainLength === 1) names.add(SINGLE_LINK_NAME);
  return names;
}

/**
 * TXT records an SPF run replaces: every SPF record, every TXT record
 * reached by following include:/redirect= targets inside the domain, and
 * every TXT record at a name the new chain writes.
 */
export function findStaleSpfRecords(domain: string, records: DnsRecord[], chainNames: Set<string>): DnsRecord[] {
  const txt = records.filter((r) => r.type === 'TXT');
  const stale = new Set<DnsRecord>();
  const visited = new Set<string>();
  const pending: DnsRecord[] = [];

  const mark = (record: DnsRecord): void => {
    if (!stale.has(record)) {
      stale.add(record);
      pending.push(record);
    }
  };

  for (const record of txt) {
    if (isSpfRecord(record) || chainNames.has(record.name.toLowerCase())) {
      mark(record);
    }
  }

  while (pending.length > 0) {
    const record = pending.pop();
    if (!record) break;

    for (const target of spfTargetsWithin(record.content, domain)) {
      if (visited.has(target)) continue;
      visited.add(target);
      txt.filter((r) => r.name.toLowerCase() === target).forEach(mark);
    }
  }

  // Keep registrar order
  return txt.filter((r) => stale.has(r));
}

/**
 * Plan an SPF run for one domain. Throws ValidationError for a bad spec
 * or a chain record the validator rejects, and GenerationExhaustedError
 * when no free label can be drawn. Nothing has been written either way.
 */
export function planSpfChain(
  spec: SpfChainSpec,
  existing: DnsRecord[],
  options: SpfChainPlanOptions = {}
): SpfChainPlan {
  validateChainSpec(spec, options);

  const domain = normalizeHostname(spec.domain);
  const toDelete = findStaleSpfRecords(domain, existing, fixedChainNames(spec));
  const deleting = new Set(toDelete);
  const existingNames = existing.filter((r) => !deleting.has(r)).map((r) => r.name);

  const chain = generateSpfChain({ ...spec, domain }, existingNames, options);
  const toCreate = chain.map((link): DnsRecordInput => {
    const record: DnsRecordInput = { name: link.subdomainName, type: 'TXT', content: link.txtBody };
    if (spec.ttl !== undefined) record.ttl = spec.ttl;
    return record;
  });

  if (options.validator) {
    assertChainValid(toCreate, options.validator);
  }

  const dependentCreates = chain.filter((record) => record.role !== 'link').length;
  return { plan: { toDelete, toCreate, dependentCreates }, chain };
}

function assertChainValid(records: DnsRecordInput[], validator: RecordValidator): void {
  const issues: FieldIssue[] = [];
  records.forEach((record, index) => {
    const result = validator.validate(record);
    if (!result.success) {
      const label = record.name === '' ? '@' : record.name;
      for (const issue of result.error.issues) {
        issues.push({ field: `toCreate.${index}.${issue.field}`, message: `${label}: ${issue.message}` });
      }
    }
  });

  if (issues.length > 0) {
    throw ValidationError.fromIssues('SPF chain', issues);
  }
}
