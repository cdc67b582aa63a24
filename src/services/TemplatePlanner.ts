/**
 * Template planning: the smallest set of calls that makes a domain carry
 * the desired records.
 */
import type { DnsRecord, DnsRecordInput, DnsRecordType, ReconciliationPlan } from '../types/index.js';
import { unquoteTxt } from '../utils/dns.js';

export interface TemplatePlanOptions {
  /** Every existing record of these types is deleted and the desired ones created fresh */
  replaceTypes?: DnsRecordType[];
  /** Delete existing records at a templated name/type that no desired record matched */
  pruneUnmatched?: boolean;
}

function recordKey(name: string, type: DnsRecordType): string {
  return `${name.toLowerCase()}|${type}`;
}

function sameContent(existing: DnsRecord, desired: DnsRecordInput): boolean {
  if (desired.type === 'TXT') {
    return unquoteTxt(existing.content) === unquoteTxt(desired.content);
  }
  return existing.content.trim().toLowerCase() === desired.content.trim().toLowerCase();
}

/**
 * True when writing `desired` over `existing` would change nothing
 */
export function recordMatches(existing: DnsRecord, desired: DnsRecordInput): boolean {
  if (!sameContent(existing, desired)) return false;
  if (desired.ttl !== undefined && existing.ttl !== desired.ttl) return false;
  if (desired.priority !== undefined && existing.priority !== desired.priority) return false;
  return true;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

export function planTemplate(
  existing: DnsRecord[],
  desired: DnsRecordInput[],
  options: TemplatePlanOptions = {}
): ReconciliationPlan {
  const replaceTypes = new Set(options.replaceTypes ?? []);
  const toDelete = existing.filter((r) => replaceTypes.has(r.type));
  const toUpdate: Array<{ existing: DnsRecord; desired: DnsRecordInput }> = [];
  const toCreate: DnsRecordInput[] = [];

  const existingByKey = groupBy(
    existing.filter((r) => !replaceTypes.has(r.type)),
    (r) => recordKey(r.name, r.type)
  );
  const desiredByKey = groupBy(desired, (r) => recordKey(r.name, r.type));

  for (const [key, wanted] of desiredByKey) {
    const available = [...(existingByKey.get(key) ?? [])];
    const unmatched: DnsRecordInput[] = [];

    // Identical records are left alone
    for (const record of wanted) {
      const index = available.findIndex((e) => recordMatches(e, record));
      if (index >= 0) {
        available.splice(index, 1);
      } else {
        unmatched.push(record);
      }
    }

    for (const record of unmatched) {
      const target = available.shift();
      if (target) {
        toUpdate.push({ existing: target, desired: record });
      } else {
        toCreate.push(record);
      }
    }

    if (options.pruneUnmatched) {
      toDelete.push(...available);
    }
  }

  return { toDelete, toUpdate, toCreate };
}
