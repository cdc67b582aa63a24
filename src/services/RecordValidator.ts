/**
 * Record Validator
 * Checks a record against the rules for its type before it is written.
 * Nothing is coerced: a bad value is reported, never fixed up.
 */
import { ValidationError, type FieldIssue } from '../core/errors.js';
import type { DnsRecordInput } from '../types/index.js';
import { isHostname, isIPv4, isIPv6, isRecordName } from '../utils/dns.js';

export type ValidationResult = { success: true } | { success: false; error: ValidationError };

export interface RecordValidatorOptions {
  txtMaxLength?: number;
}

const DEFAULT_TXT_MAX_LENGTH = 2048;
const HEX_PATTERN = /^[0-9a-f]+$/i;
const CAA_TAG_PATTERN = /^[a-z0-9]+$/i;

function isIntInRange(value: string | undefined, min: number, max: number): boolean {
  if (value === undefined || !/^\d+$/.test(value)) {
    return false;
  }
  const parsed = Number(value);
  return parsed >= min && parsed <= max;
}

/** Hostname, or '.' meaning "no target" */
function isTarget(value: string | undefined): boolean {
  return value !== undefined && (value === '.' || isHostname(value));
}

export class RecordValidator {
  private readonly txtMaxLength: number;

  constructor(options: RecordValidatorOptions = {}) {
    this.txtMaxLength = options.txtMaxLength ?? DEFAULT_TXT_MAX_LENGTH;
  }

  validate(record: DnsRecordInput): ValidationResult {
    const issues = this.collectIssues(record);
    if (issues.length === 0) {
      return { success: true };
    }
    const label = record.name === '' ? '@' : record.name;
    return { success: false, error: ValidationError.fromIssues(`${record.type} record ${label}`, issues) };
  }

  /**
   * Throwing variant of `validate`
   */
  assertValid(record: DnsRecordInput): void {
    const result = this.validate(record);
    if (!result.success) {
      throw result.error;
    }
  }

  private collectIssues(record: DnsRecordInput): FieldIssue[] {
    const issues: FieldIssue[] = [];
    const add = (field: string, message: string): void => {
      issues.push({ field, message });
    };

    if (!isRecordName(record.name)) {
      add('name', `Invalid record name: ${record.name}`);
    }
    if (record.content.trim().length === 0) {
      add('content', 'Content is required');
      return issues;
    }
    if (record.ttl !== undefined && !(Number.isInteger(record.ttl) && record.ttl > 0)) {
      add('ttl', 'TTL must be a positive integer');
    }
    if (record.priority !== undefined && !(Number.isInteger(record.priority) && record.priority >= 0 && record.priority <= 65535)) {
      add('priority', 'Priority must be an integer between 0 and 65535');
    }

    this.checkContent(record, add);
    return issues;
  }

  private checkContent(record: DnsRecordInput, add: (field: string, message: string) => void): void {
    const { type } = record;
    const content = record.content.trim();
    const parts = content.split(/\s+/);

    switch (type) {
      case 'A':
        if (!isIPv4(content)) add('content', 'Invalid IPv4 address');
        break;

      case 'AAAA':
        if (!isIPv6(content)) add('content', 'Invalid IPv6 address');
        break;

      case 'CNAME':
      case 'NS':
        if (!isHostname(content)) add('content', 'Invalid hostname');
        break;

      case 'MX':
        if (record.priority === undefined) add('priority', 'MX record requires a priority');
        if (!isTarget(content)) add('content', 'Invalid mail server hostname');
        break;

      case 'TXT':
        if (record.content.length > this.txtMaxLength) {
          add('content', `TXT content exceeds ${this.txtMaxLength} characters`);
        }
        break;

      case 'SRV':
        if (record.priority === undefined) add('priority', 'SRV record requires a priority');
        if (parts.length !== 3) {
          add('content', 'SRV content must be "weight port target"');
          break;
        }
        if (!isIntInRange(parts[0], 0, 65535)) add('content', 'SRV weight must be 0-65535');
        if (!isIntInRange(parts[1], 0, 65535)) add('content', 'SRV port must be 0-65535');
        if (!isTarget(parts[2])) add('content', 'SRV target must be a hostname');
        break;

      case 'CAA':
        if (parts.length < 3) {
          add('content', 'CAA content must be "flags tag value"');
          break;
        }
        if (!isIntInRange(parts[0], 0, 255)) add('content', 'CAA flags must be 0-255');
        if (!CAA_TAG_PATTERN.test(parts[1] ?? '')) add('content', 'CAA tag must be alphanumeric');
        break;

      case 'TLSA':
        if (parts.length !== 4) {
          add('content', 'TLSA content must be "usage selector matching-type data"');
          break;
        }
        if (!isIntInRange(parts[0], 0, 3)) add('content', 'TLSA usage must be 0-3');
        if (!isIntInRange(parts[1], 0, 1)) add('content', 'TLSA selector must be 0-1');
        if (!isIntInRange(parts[2], 0, 2)) add('content', 'TLSA matching type must be 0-2');
        if (!HEX_PATTERN.test(parts[3] ?? '')) add('content', 'TLSA data must be hexadecimal');
        break;

      case 'HTTPS':
      case 'SVCB':
        if (parts.length < 2) {
          add('content', `${type} content must be "priority target [params]"`);
          break;
        }
        if (!isIntInRange(parts[0], 0, 65535)) add('content', `${type} priority must be 0-65535`);
        if (!isTarget(parts[1])) add('content', `${type} target must be a hostname or "."`);
        break;
    }
  }
}
