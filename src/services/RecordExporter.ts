/**
 * Export DNS records as JSON, CSV or a BIND-style zone snippet
 */
import type { DnsRecord, ExportFormat } from '../types/index.js';
import { ValidationError } from '../core/errors.js';
import { toFqdn } from '../utils/dns.js';

const CSV_HEADERS = ['id', 'domain', 'name', 'type', 'content', 'ttl', 'priority', 'notes'] as const;

function escapeCsv(value: string | number | undefined): string {
  if (value === undefined) return '';
  const text = String(value);
  if (text.includes(',') || text.includes('"') || text.includes('\n')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function recordsToJson(records: DnsRecord[]): string {
  return JSON.stringify(records, null, 2);
}

export function recordsToCsv(records: DnsRecord[]): string {
  const rows = records.map((r) => CSV_HEADERS.map((header) => escapeCsv(r[header])).join(','));
  return [CSV_HEADERS.join(','), ...rows].join('\n');
}

function zoneContent(record: DnsRecord): string {
  if (record.type === 'TXT' && !record.content.startsWith('"')) {
    return `"${record.content.replace(/"/g, '\\"')}"`;
  }
  if ((record.type === 'MX' || record.type === 'SRV') && record.priority !== undefined) {
    return `${record.priority} ${record.content}`;
  }
  return record.content;
}

export function recordsToZone(records: DnsRecord[]): string {
  return records
    .map((r) => `${toFqdn(r.name, r.domain)}.\t${r.ttl}\tIN\t${r.type}\t${zoneContent(r)}`)
    .join('\n');
}

export function exportRecords(records: DnsRecord[], format: ExportFormat): string {
  switch (format) {
    case 'json':
      return recordsToJson(records);
    case 'csv':
      return recordsToCsv(records);
    case 'zone':
      return recordsToZone(records);
    default: {
      const unsupported: never = format;
      throw new ValidationError(`Unsupported export format: ${String(unsupported)}`);
    }
  }
}
