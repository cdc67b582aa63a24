import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { RecordBackup, backupTimestamp } from '../../../src/services/RecordBackup.js';
import { ValidationError } from '../../../src/core/errors.js';
import type { DnsRecord } from '../../../src/types/index.js';

const records: DnsRecord[] = [
  { id: '1', domain: 'example.com', name: '', type: 'TXT', content: 'v=spf1 -all', ttl: 600 },
  { id: '2', domain: 'example.com', name: '', type: 'MX', content: 'mail.example.com', ttl: 600, priority: 10 },
];

describe('RecordBackup', () => {
  let dir: string;
  let clock: Date;
  let backup: RecordBackup;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bulk-dns-backup-'));
    clock = new Date('2026-10-19T08:30:00.000Z');
    backup = new RecordBackup(join(dir, 'nested'), () => clock);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should format timestamps for file names', () => {
    expect(backupTimestamp(new Date('2026-10-19T08:30:00.123Z'))).toBe('20261019T083000123Z');
  });

  it('should keep two backups taken within the same second', async () => {
    await backup.write('example.com', records);
    clock = new Date('2026-10-19T08:30:00.250Z');
    await backup.write('example.com', []);

    await expect(backup.list('example.com')).resolves.toEqual([
      '20261019T083000000Z_example.com.json',
      '20261019T083000250Z_example.com.json',
    ]);
    await expect(backup.read('20261019T083000000Z_example.com.json')).resolves.toEqual(records);
  });

  it('should write and read back a domain backup', async () => {
    const path = await backup.write('Example.COM', records);

    expect(path).toBe(join(dir, 'nested', '20261019T083000000Z_example.com.json'));
    await expect(backup.read('20261019T083000000Z_example.com.json')).resolves.toEqual(records);
  });

  it('should list backups oldest first, optionally per domain', async () => {
    await backup.write('example.com', records);
    clock = new Date('2026-10-19T09:00:00.000Z');
    await backup.write('example.org', []);
    await backup.write('example.com', []);

    await expect(backup.list()).resolves.toEqual([
      '20261019T083000000Z_example.com.json',
      '20261019T090000000Z_example.com.json',
      '20261019T090000000Z_example.org.json',
    ]);
    await expect(backup.list('example.com')).resolves.toEqual([
      '20261019T083000000Z_example.com.json',
      '20261019T090000000Z_example.com.json',
    ]);
  });

  it('should return an empty list when nothing was written', async () => {
    await expect(backup.list()).resolves.toEqual([]);
  });

  it('should reject a file that is not a record list', async () => {
    await backup.write('example.com', []);
    await writeFile(join(dir, 'nested', 'broken.json'), '{"records": true}');
    await writeFile(join(dir, 'nested', 'garbled.json'), 'not json');

    await expect(backup.read('broken.json')).rejects.toBeInstanceOf(ValidationError);
    await expect(backup.read('garbled.json')).rejects.toThrow(/^Backup garbled.json is not valid JSON/);
  });
});
