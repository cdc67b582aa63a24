import { describe, it, expect } from 'vitest';
import { RecordValidator } from '../../../src/services/RecordValidator.js';
import { ValidationError } from '../../../src/core/errors.js';
import type { DnsRecordInput } from '../../../src/types/index.js';

const validator = new RecordValidator();

function messageFor(record: DnsRecordInput): string | undefined {
  const result = validator.validate(record);
  return result.success ? undefined : result.error.message;
}

describe('RecordValidator', () => {
  it('should accept one valid record of every type', () => {
    const records: DnsRecordInput[] = [
      { name: 'www', type: 'A', content: '192.0.2.1' },
      { name: 'www', type: 'AAAA', content: '2001:db8::1' },
      { name: 'blog', type: 'CNAME', content: 'example.net' },
      { name: '', type: 'MX', content: 'mail.example.com', priority: 10 },
      { name: '', type: 'TXT', content: 'v=spf1 -all' },
      { name: 'sub', type: 'NS', content: 'ns1.example.net' },
      { name: '_sip._tcp', type: 'SRV', content: '5 5060 sip.example.com', priority: 10 },
      { name: '_443._tcp', type: 'TLSA', content: '3 1 1 0123456789abcdef' },
      { name: '', type: 'CAA', content: '0 issue "ca.example.net"' },
      { name: '', type: 'HTTPS', content: '1 . alpn=h2' },
      { name: '_svc', type: 'SVCB', content: '1 svc.example.com' },
      { name: '*', type: 'A', content: '192.0.2.1' },
    ];

    for (const record of records) {
      expect(validator.validate(record)).toEqual({ success: true });
    }
  });

  it('should reject bad addresses', () => {
    expect(messageFor({ name: 'www', type: 'A', content: '999.0.0.1' })).toBe(
      'Invalid A record www: content: Invalid IPv4 address'
    );
    expect(messageFor({ name: 'www', type: 'AAAA', content: '192.0.2.1' })).toBe(
      'Invalid AAAA record www: content: Invalid IPv6 address'
    );
  });

  it('should only report missing content when content is empty', () => {
    expect(messageFor({ name: '', type: 'A', content: '  ', ttl: -1 })).toBe('Invalid A record @: content: Content is required');
  });

  it('should require a priority for MX and SRV', () => {
    expect(messageFor({ name: '', type: 'MX', content: 'mail.example.com' })).toBe(
      'Invalid MX record @: priority: MX record requires a priority'
    );
    expect(messageFor({ name: '_sip._tcp', type: 'SRV', content: '5 5060 sip.example.com' })).toBe(
      'Invalid SRV record _sip._tcp: priority: SRV record requires a priority'
    );
  });

  it('should accept a null MX target', () => {
    expect(validator.validate({ name: '', type: 'MX', content: '.', priority: 0 })).toEqual({ success: true });
  });

  it('should check SRV content fields', () => {
    expect(messageFor({ name: '_sip._tcp', type: 'SRV', content: '5 70000 sip.example.com', priority: 1 })).toBe(
      'Invalid SRV record _sip._tcp: content: SRV port must be 0-65535'
    );
    expect(messageFor({ name: '_sip._tcp', type: 'SRV', content: '5 5060', priority: 1 })).toBe(
      'Invalid SRV record _sip._tcp: content: SRV content must be "weight port target"'
    );
  });

  it('should check TLSA and CAA fields', () => {
    expect(messageFor({ name: '_443._tcp', type: 'TLSA', content: '4 1 1 abcd' })).toBe(
      'Invalid TLSA record _443._tcp: content: TLSA usage must be 0-3'
    );
    expect(messageFor({ name: '_443._tcp', type: 'TLSA', content: '3 1 1 xyz' })).toBe(
      'Invalid TLSA record _443._tcp: content: TLSA data must be hexadecimal'
    );
    expect(messageFor({ name: '', type: 'CAA', content: '0 issue' })).toBe(
      'Invalid CAA record @: content: CAA content must be "flags tag value"'
    );
  });

  it('should limit TXT length', () => {
    const small = new RecordValidator({ txtMaxLength: 10 });

    expect(small.validate({ name: '', type: 'TXT', content: '0123456789' })).toEqual({ success: true });
    const result = small.validate({ name: '', type: 'TXT', content: '0123456789a' });
    expect(result.success ? undefined : result.error.message).toBe(
      'Invalid TXT record @: content: TXT content exceeds 10 characters'
    );
  });

  it('should reject bad names, TTLs and priorities together', () => {
    expect(messageFor({ name: 'www.', type: 'A', content: '192.0.2.1', ttl: 0, priority: 70000 })).toBe(
      'Invalid A record www.: name: Invalid record name: www.; ttl: TTL must be a positive integer; priority: Priority must be an integer between 0 and 65535'
    );
  });

  it('should throw from assertValid', () => {
    expect(() => validator.assertValid({ name: 'blog', type: 'CNAME', content: 'not a host' })).toThrow(ValidationError);
    expect(() => validator.assertValid({ name: 'blog', type: 'CNAME', content: 'example.net' })).not.toThrow();
  });
});
