/**
 * Record Backup
 * Writes a domain's record list to `<timestamp>_<domain>.json` before a
 * run changes it, and reads those files back.
 */
import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ValidationError } from '../core/errors.js';
import { dnsRecordSchema } from '../config/schema.js';
import type { DnsRecord } from '../types/index.js';
import { normalizeHostname } from '../utils/dns.js';
import { recordsToJson } from './RecordExporter.js';

const backupFileSchema = z.array(dnsRecordSchema);

/**
 * 2026-10-19T08:30:00.123Z -> 20261019T083000123Z
 */
export function backupTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export class RecordBackup {
  private readonly logger: Logger;

  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = createChildLogger({ service: 'RecordBackup' });
  }

  getDirectory(): string {
    return this.directory;
  }

  /**
   * Write the records and return the file path
   */
  async write(domain: string, records: DnsRecord[]): Promise<string> {
    const zone = normalizeHostname(domain);
    const path = join(this.directory, `${backupTimestamp(this.now())}_${zone}.json`);

    await mkdir(this.directory, { recursive: true });
    await writeFile(path, recordsToJson(records), 'utf-8');

    this.logger.debug({ domain: zone, count: records.length, path }, 'Record backup written');
    return path;
  }

  /**
   * Backup file names, oldest first, optionally for one domain
   */
  async list(domain?: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const suffix = domain ? `_${normalizeHostname(domain)}.json` : '.json';
    return entries.filter((name) => name.endsWith(suffix)).sort();
  }

  async read(fileName: string): Promise<DnsRecord[]> {
    const raw = await readFile(join(this.directory, fileName), 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Backup ${fileName} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = backupFileSchema.safeParse(parsed);
    if (!result.success) {
      throw ValidationError.fromIssues(
        `backup ${fileName}`,
        result.error.errors.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
      );
    }
    return result.data;
  }
}
