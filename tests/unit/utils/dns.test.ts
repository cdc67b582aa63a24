import { describe, it, expect } from 'vitest';
import {
  dedupeDomains,
  isHostname,
  isRecordName,
  normalizeHostname,
  toFqdn,
  toRelativeName,
  unquoteTxt,
} from '../../../src/utils/dns.js';

describe('dns utils', () => {
  it('should normalize hostnames', () => {
    expect(normalizeHostname(' Example.COM. ')).toBe('example.com');
  });

  it('should dedupe domains keeping the first occurrence', () => {
    expect(dedupeDomains(['b.example', 'A.example', 'b.example.', '', 'a.example'])).toEqual(['b.example', 'a.example']);
  });

  describe('isHostname', () => {
    it('should accept valid hostnames', () => {
      expect(isHostname('example.com')).toBe(true);
      expect(isHostname('mail.example.com.')).toBe(true);
      expect(isHostname('_spf.example.com')).toBe(true);
    });

    it('should reject invalid hostnames', () => {
      expect(isHostname('')).toBe(false);
      expect(isHostname('-bad.example.com')).toBe(false);
      expect(isHostname('two words.example')).toBe(false);
      expect(isHostname('a..example')).toBe(false);
      expect(isHostname(`${'a'.repeat(64)}.example`)).toBe(false);
    });
  });

  describe('isRecordName', () => {
    it('should accept apex, wildcard and relative names', () => {
      expect(isRecordName('')).toBe(true);
      expect(isRecordName('*')).toBe(true);
      expect(isRecordName('*.mail')).toBe(true);
      expect(isRecordName('www')).toBe(true);
    });

    it('should reject absolute and malformed names', () => {
      expect(isRecordName('www.')).toBe(false);
      expect(isRecordName('a b')).toBe(false);
      expect(isRecordName('mail.*')).toBe(false);
    });
  });

  it('should convert between absolute and relative names', () => {
    expect(toRelativeName('example.com', 'example.com')).toBe('');
    expect(toRelativeName('WWW.Example.com.', 'example.com')).toBe('www');
    expect(toRelativeName('@', 'example.com')).toBe('');
    expect(toFqdn('', 'example.com')).toBe('example.com');
    expect(toFqdn('_spf', 'example.com')).toBe('_spf.example.com');
    expect(toFqdn('www.example.com', 'example.com')).toBe('www.example.com');
  });

  it('should strip one pair of quotes from TXT content', () => {
    expect(unquoteTxt('"v=spf1 -all"')).toBe('v=spf1 -all');
    expect(unquoteTxt('v=spf1 -all')).toBe('v=spf1 -all');
  });
});
